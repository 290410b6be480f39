/**
 * File map rendering: one line per directory, then one "├── " line per file.
 */

import type { FileMap } from './discover.js';

export function formatFileMap(fileMap: FileMap): string {
    const dirs = [...fileMap.keys()].sort((a, b) => a.localeCompare(b));
    let output = '';

    for (const dir of dirs) {
        output += `${dir}\n`;
        const files = [...(fileMap.get(dir) ?? [])].sort((a, b) => a.localeCompare(b));
        for (const file of files) {
            output += `├── ${file}\n`;
        }
    }

    return output;
}
