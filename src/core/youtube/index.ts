export {
  YouTubeAuthorizer,
  FileTokenStore,
  createOAuthClient,
  isTokenValid,
  runLocalServerFlow,
  UPLOAD_SCOPES,
  type TokenStore,
  type InteractiveFlow,
  type AuthCallbacks,
} from './auth.js';
export {
  YouTubeUploader,
  findLatestCompilation,
  buildVideoResource,
  type InsertVideo,
  type UploadOptions,
  type UploadResult,
} from './uploader.js';
