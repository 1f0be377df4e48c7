// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { SingleBar } from 'cli-progress';
import { i } from '../i18n';
import { InstallEvents } from '../interfaces/events';
import { Session } from '../session';

/**
 * Renders download progress as a bar when stdout is a terminal, and passes
 * the installer's output to the debug channel as it is produced.
 *
 * `stop` must be called once the pipeline is done, whatever its outcome.
 */
export function consoleEvents(session: Session): Partial<InstallEvents> & { stop(): void } {
  const isTty = process.stdout.isTTY === true;
  let bar: SingleBar | undefined;

  const stop = () => {
    bar?.stop();
    bar = undefined;
  };

  return {
    stop,
    downloadStart: (url) => {
      if (isTty) {
        bar = new SingleBar({
          clearOnComplete: true,
          hideCursor: true,
          barCompleteChar: '*',
          barIncompleteChar: ' ',
          format: '{bar}* {percentage}% {suffix}',
        });
        bar.start(100, 0, { suffix: i`downloading ${url}` });
      }
    },
    downloadProgress: (_url, _destination, percent) => {
      bar?.update(percent);
    },
    downloadRetry: () => {
      bar?.update(0);
    },
    downloadComplete: stop,
    hashVerifyStart: (file) => {
      stop();
      session.channels.debug(`verifying ${file}`);
    },
    unpackArchiveStart: (archive, destination) => {
      stop();
      session.channels.debug(`unpacking ${archive} into ${destination}`);
    },
    installerStart: (command, args) => {
      stop();
      session.channels.debug(`running ${command} ${args.join(' ')}`);
    },
    installerOutput: (chunk) => {
      session.channels.debug(chunk.trimEnd());
    },
  };
}
