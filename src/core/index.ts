export {
  Compiler,
  type CompilerCallbacks,
  type CompilerStep,
  type CompilationResult,
} from './compiler.js';
export { KarakeepClient } from './karakeep/index.js';
export { MatrixClient } from './matrix/index.js';
export { YtDlp, Ffmpeg } from './media/index.js';
export { MetadataStore } from './state/index.js';
export { ReportGenerator } from './output/index.js';
export { YouTubeAuthorizer, FileTokenStore, YouTubeUploader, findLatestCompilation } from './youtube/index.js';
