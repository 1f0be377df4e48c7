// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Transform, TransformCallback } from 'stream';
import { Stopwatch } from '../util/channels';

export interface ProgressTrackingEvents {
  on(event: 'progress', callback: (progress: number, currentPosition: number, msec: number) => void): this;
}

/** Passes chunks through, emitting `progress` with the percentage of `total` bytes seen so far. */
export class ProgressTrackingStream extends Transform implements ProgressTrackingEvents {
  private readonly stopwatch = new Stopwatch;
  private currentPosition = 0;

  /** @param total expected byte count; unknown (0 or less) reports 0% until the end */
  constructor(private readonly total: number) {
    super();
  }

  override _transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback): void {
    if (!Buffer.isBuffer(chunk)) {
      return callback(new Error('unexpected chunk type'));
    }

    this.currentPosition += chunk.byteLength;
    this.emit('progress', this.currentPercentage, this.currentPosition, this.stopwatch.total);
    return callback(null, chunk);
  }

  get currentPercentage() {
    if (this.total <= 0) {
      return 0;
    }
    const clamped = Math.min(this.currentPosition, this.total);
    return Math.round(clamped * 1000 / this.total) / 10;
  }
}
