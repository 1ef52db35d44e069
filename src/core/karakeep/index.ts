export { KarakeepClient, bookmarksInWindow, bookmarkUrls } from './client.js';
