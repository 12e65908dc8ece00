export { RepoChecklist } from './RepoChecklist.js';
export type { ChecklistOutcome, CrawlHooks } from './RepoChecklist.js';
export { crawlTree } from './core/CrawlEngine.js';
export type { CrawlDeps, LinkSource } from './core/CrawlEngine.js';
export { PageExtractor, extractLinksFromHtml } from './core/PageExtractor.js';
export { classifyLink, isIgnored, DEFAULT_LINK_CLASS, DEFAULT_ORIGIN } from './core/LinkClassifier.js';
export { groupByDirectory } from './core/ResultGrouper.js';
export { HostScheduler } from './core/HostScheduler.js';
export { ListingFetcher } from './core/ListingFetcher.js';
export { renderChecklist, checklistFileName, writeChecklist } from './output/Checklist.js';
export { CrawlOptionsSchema, parseCrawlOptions, splitIgnore, toCrawlConfig } from './schemas.js';
export type { CrawlOptions, CrawlOptionsInput } from './schemas.js';
export { ChecklistError, FetchError, ParseError, InputValidationError } from './errors.js';
export * from './types.js';
