/**
 * Tree Controller - interaction state machine over a SelectionTree.
 *
 * States: browsing → confirmed | cancelled
 * Actions only take effect while browsing; terminal states are final.
 */

import type { SelectionTree } from './tree.js';

export type SelectionState =
  | { status: 'browsing' }
  | { status: 'confirmed'; paths: string[] }
  | { status: 'cancelled'; reason: string };

export type SelectionAction =
  | { type: 'MOVE_UP' }
  | { type: 'MOVE_DOWN' }
  | { type: 'EXPAND' }
  | { type: 'COLLAPSE' }
  | { type: 'TOGGLE_SELECT' }
  | { type: 'SELECT_ALL' }
  | { type: 'DESELECT_ALL' }
  | { type: 'CONFIRM' }
  | { type: 'QUIT' }
  | { type: 'CANCEL' };

export const NO_FILES_SELECTED = 'no files selected';
export const SELECTION_CANCELLED = 'selection cancelled';

export class TreeController {
  private state: SelectionState = { status: 'browsing' };

  constructor(readonly tree: SelectionTree) {}

  getState(): SelectionState {
    return this.state;
  }

  isDone(): boolean {
    return this.state.status !== 'browsing';
  }

  dispatch(action: SelectionAction): SelectionState {
    if (this.state.status !== 'browsing') return this.state;

    const { tree } = this;

    switch (action.type) {
      case 'MOVE_UP':
        tree.moveCursor('previous');
        break;

      case 'MOVE_DOWN':
        tree.moveCursor('next');
        break;

      case 'EXPAND':
      case 'COLLAPSE': {
        const expand = action.type === 'EXPAND';
        const node = tree.current()?.node;
        // Only a directory whose flag would actually change
        if (node?.kind === 'directory' && node.expanded !== expand) {
          tree.setExpanded(node.id, expand);
          tree.reflatten();
        }
        break;
      }

      case 'TOGGLE_SELECT':
        tree.toggleAtCursor();
        break;

      case 'SELECT_ALL':
        tree.selectAll();
        break;

      case 'DESELECT_ALL':
        tree.deselectAll();
        break;

      case 'CONFIRM':
        if (tree.selectedCount() > 0) {
          this.state = { status: 'confirmed', paths: tree.selectedPaths() };
        }
        break;

      case 'QUIT':
        this.state = tree.selectedCount() > 0
          ? { status: 'confirmed', paths: tree.selectedPaths() }
          : { status: 'cancelled', reason: NO_FILES_SELECTED };
        break;

      case 'CANCEL':
        this.state = { status: 'cancelled', reason: SELECTION_CANCELLED };
        break;
    }

    return this.state;
  }
}
