export interface GeneratedImage {
  data: Buffer;
  revisedPrompt?: string;
}

export interface DecodedImage {
  /** Always PNG-encoded. */
  data: Buffer;
  width: number;
  height: number;
  format: string;
}

export type Visibility = 'public' | 'unlisted' | 'private' | 'direct';

export interface MediaAttachment {
  id: string;
  type: 'unknown' | 'image' | 'gifv' | 'video' | 'audio';
  url: string | null;
  preview_url?: string | null;
  description?: string | null;
}

export interface Status {
  id: string;
  url: string | null;
  uri: string;
  content: string;
  visibility: Visibility;
  created_at: string;
  media_attachments: MediaAttachment[];
}

export interface Account {
  id: string;
  username: string;
  acct: string;
  url: string;
}

export interface AppToken {
  access_token: string;
  token_type: string;
  scope: string;
  created_at: number;
}

export interface UploadOptions {
  filename: string;
  description?: string;
}

export interface PostOptions {
  status: string;
  mediaIds?: string[];
  visibility?: Visibility;
  idempotencyKey?: string;
}

export interface PublishRequest {
  adjective: string;
  prompt: string;
  data: Buffer;
}

export interface PublishResult {
  id: string;
  url: string | null;
}

export interface Publisher {
  publish(request: PublishRequest): Promise<PublishResult>;
}

export interface RunOptions {
  adjective?: string;
  post?: boolean;
  dryRun?: boolean;
}

export interface RunResult {
  adjective: string;
  prompt: string;
  filepath?: string;
  width?: number;
  height?: number;
  status?: PublishResult;
}
