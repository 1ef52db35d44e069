export { MatrixClient } from './client.js';
export { walkHistory, isLastPage, collectEvents, chatUrls, type PageFetcher } from './history.js';
