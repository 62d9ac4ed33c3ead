export * from './scrape.js';
