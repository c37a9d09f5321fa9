import type { NexusSiteDefinition } from "./nexus.ts";

/** 北洋园 PT 站：存活时间列直接是被 <br> 拆成两行的发布时间 */
export const tju: NexusSiteDefinition = {
  site: "tju",
  name: "北洋园 PT 站",
  baseUrl: "https://tjupt.org/",
  uploadedAt: (cell) =>
    cell.lines.length > 0 ? new Date(cell.lines.join(" ")) : null,
};
