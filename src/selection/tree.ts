/**
 * SelectionTree - directory/file tree built from a flat list of paths.
 *
 * Nodes live in one arena and refer to each other by integer id, so expand,
 * collapse and selection mutate a node in place. The flattened view is a
 * pre-order walk that does not descend into collapsed directories; it is what
 * the cursor indexes and what the picker draws.
 */

export type NodeId = number;

export interface DirectoryNode {
  kind: 'directory';
  id: NodeId;
  name: string;
  parent: NodeId | null;
  children: NodeId[];
  expanded: boolean;
}

export interface FileNode {
  kind: 'file';
  id: NodeId;
  name: string;
  parent: NodeId;
  /** The path exactly as it was given to build() */
  fullPath: string;
  selected: boolean;
}

export type TreeNode = DirectoryNode | FileNode;

export interface FlattenedEntry {
  readonly node: Readonly<TreeNode>;
  readonly depth: number;
}

export type CursorMove = 'next' | 'previous';

/** Split a path into its non-empty components, accepting either separator. */
export function pathComponents(path: string): string[] {
  return path.split(/[\\/]+/).filter((part) => part.length > 0);
}

export class SelectionTree {
  private readonly nodes: TreeNode[] = [];
  private entries: FlattenedEntry[] = [];
  private cursor: number | null = null;
  readonly rootId: NodeId;

  private constructor() {
    this.rootId = this.addDirectory('', null);
  }

  /**
   * Build a tree under a synthetic, unnamed root. Directories are shared between
   * paths by name; every path appends a new file leaf, so a repeated path
   * produces sibling duplicates.
   */
  static build(paths: readonly string[]): SelectionTree {
    const tree = new SelectionTree();
    for (const path of paths) tree.insert(path);
    tree.flatten();
    return tree;
  }

  // ── Structure ─────────────────────────────────────────────────────────────

  private addDirectory(name: string, parent: NodeId | null): NodeId {
    const id = this.nodes.length;
    this.nodes.push({ kind: 'directory', id, name, parent, children: [], expanded: true });
    if (parent !== null) this.directory(parent).children.push(id);
    return id;
  }

  private addFile(name: string, parent: NodeId, fullPath: string): NodeId {
    const id = this.nodes.length;
    this.nodes.push({ kind: 'file', id, name, parent, fullPath, selected: false });
    this.directory(parent).children.push(id);
    return id;
  }

  private insert(path: string): void {
    const components = pathComponents(path);
    if (components.length === 0) return;

    let current = this.rootId;
    for (const name of components.slice(0, -1)) {
      const existing = this.directory(current).children.find((childId) => {
        const child = this.node(childId);
        return child.kind === 'directory' && child.name === name;
      });
      current = existing ?? this.addDirectory(name, current);
    }

    this.addFile(components[components.length - 1] ?? path, current, path);
  }

  node(id: NodeId): Readonly<TreeNode> {
    return this.mutableNode(id);
  }

  private mutableNode(id: NodeId): TreeNode {
    const node = this.nodes[id];
    if (node === undefined) throw new RangeError(`No tree node with id ${id}`);
    return node;
  }

  private directory(id: NodeId): DirectoryNode {
    const node = this.mutableNode(id);
    if (node.kind !== 'directory') throw new TypeError(`Tree node ${id} is not a directory`);
    return node;
  }

  root(): Readonly<DirectoryNode> {
    return this.directory(this.rootId);
  }

  children(id: NodeId): Readonly<TreeNode>[] {
    const node = this.node(id);
    return node.kind === 'directory' ? node.children.map((childId) => this.node(childId)) : [];
  }

  private *files(): Generator<FileNode> {
    for (const node of this.nodes) {
      if (node.kind === 'file') yield node;
    }
  }

  // ── Flattened view and cursor ─────────────────────────────────────────────

  /** Recompute the visible sequence and put the cursor on its first entry. */
  flatten(): readonly FlattenedEntry[] {
    const entries: FlattenedEntry[] = [];
    const stack: { id: NodeId; depth: number }[] = [...this.root().children]
      .reverse()
      .map((id) => ({ id, depth: 0 }));

    while (stack.length > 0) {
      const top = stack.pop();
      if (top === undefined) break;
      const node = this.node(top.id);
      entries.push({ node, depth: top.depth });

      if (node.kind === 'directory' && node.expanded) {
        for (let i = node.children.length - 1; i >= 0; i--) {
          const childId = node.children[i];
          if (childId !== undefined) stack.push({ id: childId, depth: top.depth + 1 });
        }
      }
    }

    this.entries = entries;
    this.cursor = entries.length > 0 ? 0 : null;
    return entries;
  }

  /**
   * Flatten again after a structural change, keeping the cursor on the node it
   * was on. Falls back to the first entry when that node is no longer visible.
   */
  reflatten(): readonly FlattenedEntry[] {
    const focusId = this.current()?.node.id;
    const entries = this.flatten();
    if (focusId !== undefined) {
      const index = entries.findIndex((entry) => entry.node.id === focusId);
      if (index >= 0) this.cursor = index;
    }
    return entries;
  }

  get flattened(): readonly FlattenedEntry[] {
    return this.entries;
  }

  getCursor(): number | null {
    return this.cursor;
  }

  setCursor(index: number): void {
    if (this.entries.length === 0) {
      this.cursor = null;
      return;
    }
    this.cursor = Math.max(0, Math.min(index, this.entries.length - 1));
  }

  current(): FlattenedEntry | null {
    return this.cursor === null ? null : this.entries[this.cursor] ?? null;
  }

  /** Move one entry, wrapping around at both ends. */
  moveCursor(delta: CursorMove): void {
    const count = this.entries.length;
    if (count === 0) return;

    if (this.cursor === null) {
      this.cursor = 0;
    } else if (delta === 'next') {
      this.cursor = this.cursor >= count - 1 ? 0 : this.cursor + 1;
    } else {
      this.cursor = this.cursor === 0 ? count - 1 : this.cursor - 1;
    }
  }

  // ── Selection ─────────────────────────────────────────────────────────────

  /** Flip the file under the cursor. Directories are left alone. */
  toggleAtCursor(): boolean {
    const entry = this.current();
    if (!entry || entry.node.kind !== 'file') return false;
    const node = this.mutableNode(entry.node.id);
    if (node.kind === 'file') node.selected = !node.selected;
    return true;
  }

  selectAll(): void {
    for (const file of this.files()) file.selected = true;
  }

  deselectAll(): void {
    for (const file of this.files()) file.selected = false;
  }

  selectedCount(): number {
    let count = 0;
    for (const file of this.files()) if (file.selected) count++;
    return count;
  }

  totalFileCount(): number {
    return [...this.files()].length;
  }

  /** Selected paths in tree order, including files inside collapsed directories. */
  selectedPaths(): string[] {
    const paths: string[] = [];
    const visit = (id: NodeId): void => {
      const node = this.node(id);
      if (node.kind === 'file') {
        if (node.selected) paths.push(node.fullPath);
        return;
      }
      for (const childId of node.children) visit(childId);
    };
    visit(this.rootId);
    return paths;
  }

  // ── Expand / collapse ─────────────────────────────────────────────────────

  /** Set a directory's expanded flag. Returns false for files. */
  setExpanded(id: NodeId, expanded: boolean): boolean {
    const node = this.mutableNode(id);
    if (node.kind !== 'directory') return false;
    node.expanded = expanded;
    return true;
  }

  /**
   * Depth-first search below the root for the first directory with this name.
   * Two directories sharing a name are indistinguishable here; setExpanded()
   * addresses one exactly.
   */
  findDirectoryByName(name: string): NodeId | null {
    const search = (id: NodeId): NodeId | null => {
      for (const childId of this.directory(id).children) {
        const child = this.node(childId);
        if (child.kind !== 'directory') continue;
        if (child.name === name) return child.id;
        const found = search(child.id);
        if (found !== null) return found;
      }
      return null;
    };
    return search(this.rootId);
  }

  expandByName(name: string): boolean {
    const id = this.findDirectoryByName(name);
    return id !== null && this.setExpanded(id, true);
  }

  collapseByName(name: string): boolean {
    const id = this.findDirectoryByName(name);
    return id !== null && this.setExpanded(id, false);
  }
}
