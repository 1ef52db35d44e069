export type PrivacyStatus = 'private' | 'unlisted' | 'public';

export interface YouTubeOAuthConfig {
  clientId: string;
  clientSecret: string;
  projectId: string;
}

export interface UploadConfig {
  oauth: YouTubeOAuthConfig;
  compilationDir: string;
  tokenPath: string;
  privacyStatus: PrivacyStatus;
  categoryId: string;
}

export interface CompilationFiles {
  videoPath: string;
  reportPath: string;
  stem: string;
}
