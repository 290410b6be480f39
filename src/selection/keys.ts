/**
 * Keypress → logical action.
 */

import type { SelectionAction } from './controller.js';

/** The key object readline attaches to 'keypress' events */
export interface Keypress {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
  sequence?: string;
}

export const HELP_LINE =
  '↑/↓: Navigate | Space: Toggle selection | Enter: Confirm | →/←: Expand/Collapse | q: Quit | a: Select all | n: Deselect all';

export function actionForKey(str: string | undefined, key: Keypress | undefined): SelectionAction | null {
  const name = key?.name ?? str;

  if (key?.ctrl) {
    return name === 'c' ? { type: 'CANCEL' } : null;
  }

  switch (name) {
    case 'up':
      return { type: 'MOVE_UP' };
    case 'down':
      return { type: 'MOVE_DOWN' };
    case 'right':
      return { type: 'EXPAND' };
    case 'left':
      return { type: 'COLLAPSE' };
    case 'space':
    case ' ':
      return { type: 'TOGGLE_SELECT' };
    case 'return':
    case 'enter':
      return { type: 'CONFIRM' };
    case 'q':
    case 'escape':
      return { type: 'QUIT' };
    case 'a':
      return { type: 'SELECT_ALL' };
    case 'n':
      return { type: 'DESELECT_ALL' };
    default:
      return null;
  }
}
