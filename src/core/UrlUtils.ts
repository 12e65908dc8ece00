export function safeHttpUrl(input: string): URL | null {
    try {
        const u = new URL(input);
        if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
        return u;
    } catch {
        return null;
    }
}

/**
 * Last non-empty path segment, e.g. "Setters" for
 * "https://github.com/acme/Setters/". Falls back to the host.
 */
export function lastPathSegment(input: string): string {
    const u = safeHttpUrl(input);
    if (!u) return 'checklist';
    const segments = u.pathname.split('/').filter(Boolean);
    return segments.length > 0 ? segments[segments.length - 1] : u.hostname;
}
