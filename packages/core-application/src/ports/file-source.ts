export type FileStat = {
  sizeBytes: number;
};

export interface FileSource {
  readFile(absolutePath: string): Promise<Buffer>;
  stat(absolutePath: string): Promise<FileStat>;
}
