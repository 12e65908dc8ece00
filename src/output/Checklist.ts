import { promises as fs } from 'node:fs';
import path from 'node:path';
import { DirectoryGroup, DirectoryLink, FileLink } from '../types.js';
import { lastPathSegment } from '../core/UrlUtils.js';

export function directoryHeading(dir: DirectoryLink): string {
    return `* ###[${dir.name || '/'}](${dir.href})\n`;
}

export function fileItem(file: FileLink): string {
    return `- [ ] [${file.name}](${file.href})\n`;
}

/**
 * Markdown checklist: a heading per directory, an unchecked item per file,
 * a blank line after each group.
 */
export function renderChecklist(groups: DirectoryGroup[]): string {
    let out = '';
    for (const group of groups) {
        out += directoryHeading(group.directory);
        for (const file of group.files) {
            out += fileItem(file);
        }
        out += '\n';
    }
    return out;
}

export function checklistFileName(rootUrl: string): string {
    return `${lastPathSegment(rootUrl)}.md`;
}

export async function writeChecklist(filePath: string, markdown: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.tmp`;
    await fs.writeFile(tmp, markdown, 'utf-8');
    await fs.rename(tmp, filePath);
}
