import type { HarvestMode, HarvestRecord, RawEntry } from "./types.js";

/** Trailing elapsed-time annotation rendered after a speaker name, e.g. "1時間30分間45秒間". */
const SPEAKER_DURATION_SUFFIX = /\s+\d+\s*(時間|分間?|秒間?).*$/;

const LINE_BREAKS = /\s*[\r\n]+\s*/g;

/** Joins a multi-line reading into one line, since the raw log holds one record per line. */
export function foldLineBreaks(raw: string): string {
  return raw.replace(LINE_BREAKS, " ").trim();
}

export function normalizeSpeakerLabel(raw: string): string {
  return foldLineBreaks(raw).replace(SPEAKER_DURATION_SUFFIX, "").trim();
}

export function serializeRecord(record: HarvestRecord): string {
  return record.speaker ? `${record.speaker}\t${record.text}` : record.text;
}

/**
 * Shapes raw DOM readings into records. Line breaks fold into single spaces,
 * entries whose text is then blank are dropped, and in text-only mode speaker
 * labels are ignored.
 */
export function toRecords(entries: readonly RawEntry[], mode: HarvestMode): HarvestRecord[] {
  const records: HarvestRecord[] = [];
  for (const entry of entries) {
    const text = foldLineBreaks(entry.text ?? "");
    if (!text) {
      continue;
    }
    if (mode === "text-only") {
      records.push({ text });
      continue;
    }
    const speaker = normalizeSpeakerLabel(entry.speakerLabel ?? "");
    records.push(speaker ? { speaker, text } : { text });
  }
  return records;
}
