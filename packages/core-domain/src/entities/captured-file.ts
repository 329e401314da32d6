export interface CapturedFile {
  /** Base name, e.g. `a.txt` */
  name: string;
  /** Path relative to the archive root, `/`-separated */
  relativePath: string;
  /** Size reported by stat when the file was captured */
  sizeBytes: number;
  content: Buffer;
}
