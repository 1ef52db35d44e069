export {
  formatRunDate,
  resolveLayout,
  videoIdOf,
  listVideoFiles,
  fileSize,
  isValidFile,
  isNotFound,
  type RunLayout,
} from './layout.js';
export {
  downloadVideos,
  removeOverlongDownloads,
  exceedsCeiling,
  type DownloadOptions,
  type DownloadSummary,
} from './download.js';
export { normalizeVideos, normalizedPathFor, type NormalizeOptions } from './normalize.js';
export {
  buildTimeline,
  formatTimestamp,
  formatDuration,
  sortByFileName,
  type Timeline,
  type DurationProbe,
} from './timeline.js';
export { concatVideos, buildConcatList, escapeConcatPath } from './concat.js';
