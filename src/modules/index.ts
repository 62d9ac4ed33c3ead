export * from './normalizer.js';
export * from './selectors.js';
export * from './extractor.js';
export * from './record-builder.js';
export * from './fetcher.js';
export * from './exporter.js';
export * from './scraper.js';
