export { filterByWindow, isWithinWindow, toEpochMs, type Instant } from './window.js';
export { extractUrls, dedupeUrls } from './urls.js';
