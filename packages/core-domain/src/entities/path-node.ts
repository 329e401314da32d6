export interface PathNode {
  absolutePath: string;
  name: string;
  isDirectory: boolean;
  /** 0 for direct children of the root */
  depth: number;
}
