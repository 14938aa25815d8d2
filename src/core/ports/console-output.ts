import type { OutputPort, ProgressSpinner } from './output.js';

type Sink = (line: string) => void;

/**
 * Line-oriented OutputPort over two sinks. Errors go to the second sink so
 * that a redirected stdout still leaves failures on the terminal.
 */
export function createLineOutput(out: Sink, err: Sink = out): OutputPort {
  return {
    info: message => out(message),
    success: message => out(`✓ ${message}`),
    error: message => err(`✗ ${message}`),
    note(content, title) {
      out('');
      if (title) out(title);
      out(content);
    },
    spinner(): ProgressSpinner {
      // No animation without a TTY: print the start and the final line only.
      let current = '';
      return {
        start(message) {
          current = message;
          out(`… ${message}`);
        },
        message(text) {
          current = text;
        },
        stop(finalMessage) {
          out(`✓ ${finalMessage ?? current}`);
        }
      };
    }
  };
}

/** Output for non-interactive sessions: CI, pipes, redirected logs. */
export const consoleOutput: OutputPort = createLineOutput(
  line => console.log(line),
  line => console.error(line)
);

/** OutputPort that keeps `kind: message` lines in memory instead of printing. */
export function createRecordingOutput(): OutputPort & { lines: string[] } {
  const lines: string[] = [];
  const push = (kind: string) => (message: string) => {
    lines.push(`${kind}: ${message}`);
  };
  return {
    lines,
    info: push('info'),
    success: push('success'),
    error: push('error'),
    note(content, title) {
      lines.push(title ? `note(${title}): ${content}` : `note: ${content}`);
    },
    spinner: () => ({
      start: push('spinner'),
      message: push('spinner-message'),
      stop(finalMessage) {
        if (finalMessage) lines.push(`spinner-stop: ${finalMessage}`);
      }
    })
  };
}
