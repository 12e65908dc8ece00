import { DirectoryGroup, FileLink } from '../types.js';

/**
 * Partition files by parent directory name. Files keep their input order
 * within a group; groups come back sorted by directory name.
 */
export function groupByDirectory(files: FileLink[]): DirectoryGroup[] {
    const groups = new Map<string, DirectoryGroup>();
    for (const file of files) {
        const key = file.parentDirectory.name;
        const group = groups.get(key);
        if (group) {
            group.files.push(file);
        } else {
            groups.set(key, { directory: file.parentDirectory, files: [file] });
        }
    }

    return Array.from(groups.values()).sort((a, b) =>
        a.directory.name < b.directory.name ? -1 : a.directory.name > b.directory.name ? 1 : 0
    );
}
