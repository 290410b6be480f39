/**
 * Ignore-file pattern rules.
 *
 * A rule line is classified once: leading "!" negates, trailing "/" limits it to
 * directories, leading "/" anchors it at the root. The markers are consumed and
 * the remaining text is matched structurally against a root-relative path
 * ("/"-separated). Wildcards are not compiled to regular expressions.
 */

export interface PatternRule {
    /** The rule line as it appeared in the ignore file (trimmed) */
    raw: string;
    /** Matching text with every marker removed */
    pattern: string;
    negated: boolean;
    directoryOnly: boolean;
    rootAnchored: boolean;
}

/**
 * Classify one ignore-file line. Returns null for blank lines, comments and
 * lines that hold nothing but markers.
 */
export function parseRule(line: string): PatternRule | null {
    const raw = line.trim();
    if (!raw || raw.startsWith('#')) return null;

    let text = raw;
    const negated = text.startsWith('!');
    if (negated) text = text.slice(1).trim();

    const directoryOnly = text.endsWith('/');
    if (directoryOnly) text = text.replace(/\/+$/, '');

    const rootAnchored = text.startsWith('/');
    if (rootAnchored) text = text.replace(/^\/+/, '');

    if (!text) return null;

    return {
        raw: negated ? `!${raw.slice(1).trim()}` : raw,
        pattern: text,
        negated,
        directoryOnly,
        rootAnchored,
    };
}

function trimStars(text: string, leading: boolean, trailing: boolean): string {
    let result = text;
    if (leading) result = result.replace(/^\*+/, '');
    if (trailing) result = result.replace(/\*+$/, '');
    return result;
}

function matchesWildcard(path: string, pattern: string): boolean {
    const leading = pattern.startsWith('*');
    const trailing = pattern.endsWith('*');

    if (leading && trailing) return path.includes(trimStars(pattern, true, true));
    if (leading) return path.endsWith(trimStars(pattern, true, false));
    if (trailing) return path.startsWith(trimStars(pattern, false, true));

    // A*B*...*Z: anchored at both ends, interior fragments only need to occur somewhere
    const parts = pattern.split('*');
    const first = parts[0] ?? '';
    const last = parts[parts.length - 1] ?? '';
    return path.startsWith(first)
        && path.endsWith(last)
        && parts.slice(1, -1).every(part => path.includes(part));
}

/**
 * Does the rule's pattern match this root-relative path?
 * The rule's negation flag is not consulted here; IgnoreSet decides what a
 * negated match means.
 */
export function matchesRule(path: string, rule: PatternRule, isDirectory: boolean): boolean {
    if (rule.directoryOnly && !isDirectory) return false;

    const { pattern } = rule;

    if (rule.rootAnchored) {
        return path === pattern || path.startsWith(`${pattern}/`);
    }

    if (pattern.includes('*')) {
        return matchesWildcard(path, pattern);
    }

    if (path === pattern || path.startsWith(`${pattern}/`) || path.endsWith(`/${pattern}`)) {
        return true;
    }

    return path.includes(pattern);
}

/** Parse-and-match shorthand for a single raw pattern line. */
export function matchesPattern(path: string, rawPattern: string, isDirectory: boolean): boolean {
    const rule = parseRule(rawPattern);
    return rule !== null && matchesRule(path, rule, isDirectory);
}
