import path from 'node:path';
import { Command } from 'commander';
import { RepoChecklist } from '../RepoChecklist.js';
import { splitIgnore } from '../schemas.js';
import { writeChecklist } from '../output/Checklist.js';
import { InputValidationError } from '../errors.js';

interface CliFlags {
    url?: string;
    ext?: string;
    ignore?: string;
    out: string;
    concurrency?: number;
    delay: number;
    origin?: string;
    verbose?: boolean;
}

function parseInteger(value: string): number {
    const n = Number(value);
    return Number.isInteger(n) ? n : NaN;
}

export function buildProgram(): Command {
    return new Command()
        .name('repo-checklist')
        .description('Crawl a repository file browser and write a markdown checklist of matching files')
        .requiredOption('--url <url>', 'repository page to start from')
        .requiredOption('--ext <extension>', 'file extension to track, e.g. ".cs"')
        .option('--ignore <dirs>', 'space separated directory patterns to skip', '')
        .option('--out <dir>', 'directory to write the checklist into', 'results')
        .option('--concurrency <n>', 'maximum simultaneous fetches (default: unbounded)', parseInteger)
        .option('--delay <ms>', 'minimum delay between fetch starts', parseInteger, 0)
        .option('--origin <url>', 'site origin hrefs are resolved against')
        .option('--verbose', 'log every fetched page');
}

/**
 * Parse `argv` (node-style, program name first), crawl, and write the
 * checklist. Returns the process exit code.
 */
export async function run(argv: string[], program: Command = buildProgram()): Promise<number> {
    program.parse(argv);
    const flags = program.opts<CliFlags>();

    const input = {
        url: flags.url ?? '',
        extension: flags.ext ?? '',
        ignore: splitIgnore(flags.ignore),
        origin: flags.origin,
        concurrency: flags.concurrency,
        minDelayMs: flags.delay,
    };

    try {
        console.log(`[crawl] root: ${input.url}`);
        const outcome = await RepoChecklist.checklist(input, {
            onFetch: flags.verbose ? (url) => console.log(`[crawl] fetch: ${url}`) : undefined,
        });

        if (!outcome.ok) {
            console.error(`[crawl] failed after ${outcome.fetches} fetches: ${outcome.error.message}`);
            return 1;
        }

        const outPath = path.resolve(flags.out, outcome.fileName);
        await writeChecklist(outPath, outcome.markdown);
        console.log(`[crawl] fetched pages: ${outcome.fetches}`);
        console.log(`[crawl] files: ${outcome.files.length} in ${outcome.groups.length} directories`);
        console.log(`[crawl] saved: ${outPath}`);
        return 0;
    } catch (err) {
        if (err instanceof InputValidationError) {
            console.error(`[crawl] ${err.message}`);
            console.error('Usage: repo-checklist --url "https://github.com/<owner>/<repo>/" --ext ".cs" [--ignore "<dir> <dir>"]');
            return 1;
        }
        throw err;
    }
}
