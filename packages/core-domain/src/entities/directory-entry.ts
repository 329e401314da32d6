export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}
