import type { NexusSiteDefinition } from "./nexus.ts";

/** 北邮人 PT 站：存活时间列的 span[title] 是完整的发布时间 */
export const byr: NexusSiteDefinition = {
  site: "byr",
  name: "北邮人 PT 站",
  baseUrl: "https://byr.pt/",
  uploadedAt: (cell) => (cell.spanTitle ? new Date(cell.spanTitle) : null),
};
