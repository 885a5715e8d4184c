import { NormalizedAnnouncement } from "../interfaces/announcement";

/**
 * First occurrence per news_id wins; rows without one are dropped.
 */
export function dedupeByNewsId(rows: Iterable<NormalizedAnnouncement>): NormalizedAnnouncement[] {
  const seen = new Set<string>();
  const out: NormalizedAnnouncement[] = [];

  for (const row of rows) {
    const id = row.news_id;
    if (!id || seen.has(id)) continue;
    seen.add(id);
    out.push(row);
  }

  return out;
}
