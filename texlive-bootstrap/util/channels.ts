// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { EventEmitter } from 'node:events';
import { Stage } from './exceptions';

/** Event definitions for channel events; `msec` is the time since the session started */
export interface ChannelEvents {
  warning(text: string, msec: number): void;
  message(text: string, msec: number): void;
  debug(text: string, msec: number): void;
}

/** @internal */
export class Stopwatch {
  readonly start = process.uptime() * 1000;

  /** milliseconds since the stopwatch was created */
  get total() {
    return Math.floor(process.uptime() * 1000 - this.start);
  }
}

/**
 * The user-facing output of a session: warnings, messages and debug text, each stamped with the elapsed time.
 *
 * Also remembers which pipeline stage is running, so debug output can be
 * read back as a trace of the bootstrap.
 */
export class Channels extends EventEmitter {
  #stage?: Stage;

  constructor(readonly stopwatch: Stopwatch) {
    super();
  }

  /** the stage most recently entered */
  get stage() {
    return this.#stage;
  }

  enter(stage: Stage) {
    this.#stage = stage;
    this.debug(`stage: ${stage}`);
  }

  private send(event: keyof ChannelEvents, text: string | Array<string>) {
    for (const each of typeof text === 'string' ? [text] : text) {
      this.emit(event, each, this.stopwatch.total);
    }
  }

  warning(text: string | Array<string>) {
    this.send('warning', text);
  }
  message(text: string | Array<string>) {
    this.send('message', text);
  }
  debug(text: string | Array<string>) {
    this.send('debug', text);
  }
}
