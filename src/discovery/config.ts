/**
 * DiscoveryConfig - built once per invocation, frozen afterwards.
 */

/** Empty: every file passes the extension filter */
export const DEFAULT_EXTENSIONS: readonly string[] = [];
export const DEFAULT_EXCLUDES = ['.venv', 'target', 'node_modules'];
export const DEFAULT_VCS_DIR = '.git';

export interface DiscoveryConfig {
    readonly root: string;
    /** Extensions without a leading dot. Empty accepts every file. */
    readonly extensions: ReadonlySet<string>;
    /** Literal substrings; any entry whose full path contains one is pruned */
    readonly excludeSubstrings: readonly string[];
    /** Version-control directory name, pruned like an exclude substring. Empty disables. */
    readonly vcsDirName: string;
    readonly useIgnoreFile: boolean;
}

export interface DiscoveryConfigInput {
    root?: string;
    extensions?: Iterable<string>;
    excludeSubstrings?: Iterable<string>;
    vcsDirName?: string;
    useIgnoreFile?: boolean;
}

/** Split a comma-separated CLI value, trimming items and dropping empty ones. */
export function parseList(value: string | undefined): string[] {
    if (!value) return [];
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function normalizeExtension(ext: string): string {
    return ext.trim().replace(/^\.+/, '');
}

export function createDiscoveryConfig(input: DiscoveryConfigInput = {}): DiscoveryConfig {
    const extensions = new Set<string>();
    for (const ext of input.extensions ?? []) {
        const normalized = normalizeExtension(ext);
        if (normalized) extensions.add(normalized);
    }

    const excludeSubstrings: string[] = [];
    for (const item of input.excludeSubstrings ?? []) {
        if (item.length > 0) excludeSubstrings.push(item);
    }

    return Object.freeze({
        root: input.root ?? '.',
        extensions,
        excludeSubstrings: Object.freeze(excludeSubstrings),
        vcsDirName: (input.vcsDirName ?? DEFAULT_VCS_DIR).trim(),
        useIgnoreFile: input.useIgnoreFile ?? true,
    });
}
