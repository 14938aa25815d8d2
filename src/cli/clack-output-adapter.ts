import { log, note, spinner } from '@clack/prompts';
import type { OutputPort, ProgressSpinner } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';

function clackSpinner(): ProgressSpinner {
  const s = spinner();
  // Calls outside a start/stop pair are ignored.
  let running = false;
  return {
    start(message) {
      if (running) return;
      s.start(message);
      running = true;
    },
    message(text) {
      if (running) s.message(text);
    },
    stop(finalMessage) {
      if (!running) return;
      s.stop(finalMessage);
      running = false;
    }
  };
}

const clackOutput: OutputPort = {
  info: message => log.info(message),
  success: message => log.success(message),
  error: message => log.error(message),
  note: (content, title) => note(content, title ?? ''),
  spinner: clackSpinner
};

/** A session is interactive when stdout is a terminal and CI is not set. */
export function isInteractiveSession(env: NodeJS.ProcessEnv = process.env): boolean {
  return process.stdout.isTTY === true && env.CI !== 'true';
}

/** OutputPort for the CLI process. */
export function createCliOutput(interactive: boolean = isInteractiveSession()): OutputPort {
  return interactive ? clackOutput : consoleOutput;
}
