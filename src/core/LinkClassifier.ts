import { AnchorNode, ClassifyOptions, DirectoryLink, TypedLink } from '../types.js';
import { safeHttpUrl } from './UrlUtils.js';

/** Row marker of the legacy GitHub file browser. */
export const DEFAULT_LINK_CLASS = 'js-navigation-open link-gray-dark';
export const DEFAULT_ORIGIN = 'https://github.com';

// /<owner>/<repo>/<tree|blob>/<ref>/...
const REF_INDEX = 3;

export function isIgnored(directoryName: string, ignorePatterns: string[]): boolean {
    return ignorePatterns.some((p) => p !== '' && new RegExp(p).test(directoryName));
}

function pathHref(origin: string, segments: string[]): string {
    return `${origin}/${segments.join('/')}`;
}

/**
 * Decide whether one anchor is a directory row, a tracked file row, or
 * neither (null). Unrecognized anchors are the common case, not an error.
 */
export function classifyLink(node: AnchorNode, options: ClassifyOptions): TypedLink | null {
    const { extension, ignorePatterns, origin, linkClass } = options;

    if (node.attribs.class !== linkClass) return null;

    const href = node.attribs.href;
    const label = node.label?.trim();
    if (!href || !label) return null;

    let url: URL | null;
    let expectedOrigin: string;
    try {
        expectedOrigin = new URL(origin).origin;
        url = safeHttpUrl(new URL(href, origin).href);
    } catch {
        return null;
    }
    if (!url || url.origin !== expectedOrigin) return null;

    const segments = url.pathname.split('/').filter(Boolean);
    if (segments.length <= REF_INDEX) return null;

    const [owner, repo, marker, ref] = segments;

    if (marker === 'tree') {
        const dirSegments = segments.slice(REF_INDEX + 1);
        const name = dirSegments.join('/');
        if (isIgnored(name, ignorePatterns)) return null;

        return {
            kind: 'directory',
            name,
            href: pathHref(url.origin, segments),
        };
    }

    if (marker === 'blob' && segments.length > REF_INDEX + 1 && url.pathname.endsWith(extension)) {
        const dirSegments = segments.slice(REF_INDEX + 1, -1);
        const name = dirSegments.join('/');
        if (isIgnored(name, ignorePatterns)) return null;

        const parentDirectory: DirectoryLink = {
            kind: 'directory',
            name,
            href: pathHref(url.origin, [owner, repo, 'tree', ref, ...dirSegments]),
        };

        return {
            kind: 'file',
            name: label.endsWith(extension) ? label.slice(0, label.length - extension.length) : label,
            href: pathHref(url.origin, segments),
            parentDirectory,
        };
    }

    return null;
}
