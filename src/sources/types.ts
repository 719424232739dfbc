export interface ImageFile {
  path: string;
  /** Path relative to the source root, using the platform separator */
  relativePath: string;
  filename: string;
  extension: string;
}

export interface ImageSource {
  name: string;
  scan(): AsyncGenerator<ImageFile>;
  count(): Promise<number>;
}
