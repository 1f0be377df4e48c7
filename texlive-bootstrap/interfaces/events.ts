// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export interface HashVerifyEvents {
  hashVerifyStart(file: string): void;
  hashVerifyComplete(file: string): void;
}

export interface DownloadEvents extends HashVerifyEvents {
  downloadStart(url: string, destination: string): void;
  downloadProgress(url: string, destination: string, percent: number): void;
  downloadRetry(url: string, attempt: number, reason: string): void;
  downloadComplete(destination: string): void;
}

export interface FileEntry {
  archive: string;
  destination: string;
  path: string;
}

export interface UnpackEvents {
  unpackArchiveStart(archive: string, destination: string): void;
  unpackFileComplete(entry: FileEntry): void;
}

export interface InstallEvents extends DownloadEvents, UnpackEvents {
  installerStart(command: string, args: Array<string>): void;
  installerOutput(chunk: string): void;
}
