/**
 * Interactive picker session.
 *
 * Keypresses arrive through readline's keypress events; each one is mapped to an
 * action and applied synchronously. A timer redraws the frame on every tick
 * whether or not a key arrived. The session ends when the controller reaches a
 * terminal state, or when the input stream ends (treated as a cancel).
 */

import { emitKeypressEvents } from 'readline';
import { ReadStream } from 'tty';
import { NoFilesSelectedError, SelectionCancelledError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { NO_FILES_SELECTED, TreeController, type SelectionState } from './controller.js';
import { actionForKey, type Keypress } from './keys.js';
import { renderFrame } from './render.js';
import { SelectionTree } from './tree.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_ALT_SCREEN = '\x1b[?25h\x1b[?1049l';
const CLEAR = '\x1b[2J\x1b[H';
const INVERSE = '\x1b[7m';
const RESET = '\x1b[0m';

export const DEFAULT_TITLE = 'Select files to include in your LLM context';

export interface SessionOutput {
  write(chunk: string): boolean;
  rows?: number;
}

export interface SessionOptions {
  input?: NodeJS.ReadableStream;
  output?: SessionOutput;
  title?: string;
  /** Redraw interval in milliseconds (default: 100) */
  tickMs?: number;
}

function draw(output: SessionOutput, tree: SelectionTree, title: string): void {
  const frame = renderFrame(tree, title, output.rows ?? 24);
  const body = frame.lines
    .map((line, i) => (i === frame.cursorLine ? `${INVERSE}${line}${RESET}` : line))
    .join('\n');
  output.write(`${CLEAR}${body}`);
}

/**
 * Let the user pick from `paths`. Resolves with the confirmed paths; rejects with
 * SelectionCancelledError or NoFilesSelectedError.
 */
export function runInteractiveSelection(paths: readonly string[], options: SessionOptions = {}): Promise<string[]> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const title = options.title ?? DEFAULT_TITLE;
  const tickMs = options.tickMs ?? 100;

  const controller = new TreeController(SelectionTree.build(paths));

  return new Promise<string[]>((resolve, reject) => {
    const terminal = input instanceof ReadStream && input.isTTY ? input : null;

    const finish = (state: SelectionState): void => {
      clearInterval(timer);
      input.removeListener('keypress', onKeypress);
      input.removeListener('end', onEnd);
      terminal?.setRawMode(false);
      input.pause();
      output.write(LEAVE_ALT_SCREEN);

      if (state.status === 'confirmed') {
        logger.info(`Selected ${state.paths.length} files`);
        resolve(state.paths);
      } else if (state.status === 'cancelled') {
        logger.warn(`Selection ended: ${state.reason}`);
        reject(state.reason === NO_FILES_SELECTED
          ? new NoFilesSelectedError(state.reason)
          : new SelectionCancelledError(state.reason));
      }
    };

    const onKeypress = (str: string | undefined, key: Keypress | undefined): void => {
      const action = actionForKey(str, key);
      if (!action) return;
      const state = controller.dispatch(action);
      if (state.status === 'browsing') {
        draw(output, controller.tree, title);
      } else {
        finish(state);
      }
    };

    const onEnd = (): void => {
      finish(controller.dispatch({ type: 'CANCEL' }));
    };

    emitKeypressEvents(input);
    terminal?.setRawMode(true);

    output.write(ENTER_ALT_SCREEN);
    draw(output, controller.tree, title);
    const timer = setInterval(() => draw(output, controller.tree, title), tickMs);

    input.on('keypress', onKeypress);
    input.on('end', onEnd);
    input.resume();
  });
}
