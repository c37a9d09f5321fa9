declare module "parse-torrent" {
  export interface ParsedFile {
    /** 含种子根目录名的相对路径 */
    path: string;
    name: string;
    length: number;
    offset: number;
  }

  export interface Instance {
    infoHash: string;
    name?: string;
    length?: number;
    files?: ParsedFile[];
  }

  export default function parseTorrent(
    torrentId: string | Uint8Array
  ): Promise<Instance>;
}
