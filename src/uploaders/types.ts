export type UploaderKind = 's3' | 'imgur';

export interface ImageUploader {
  kind: UploaderKind;

  /**
   * Uploads one local image and returns its public URL.
   * `override` asks the uploader to replace whatever the remote already holds; uploaders that
   * cannot look at remote state always upload.
   */
  uploadImage(imagePath: string, override: boolean): Promise<string>;
}

/**
 * Built once per batch and shared by every worker. Owns the network client, so the client is
 * constructed exactly once no matter how many documents run at the same time.
 */
export interface UploaderProvider {
  kind: UploaderKind;

  /** Uploader for the images of one markdown document. */
  uploaderFor(markdownPath: string): ImageUploader;
}
