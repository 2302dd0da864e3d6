export interface PublishedPost {
  id: string;
}

export interface MicroblogClient {
  /** Upload a local file and return the platform media id. */
  uploadMedia(filePath: string): Promise<string>;
  createPost(text: string, mediaIds?: readonly string[]): Promise<PublishedPost>;
}
