export const VIEWED_FILE_EVENT_KIND = 6838;
export const ANALYSIS_REQUEST_EVENT_KIND = 5838;
/**
 * Results share the viewed-file kind; the result is the only 6838 event carrying a
 * `status` tag, and it is always the last event of an analysis.
 */
export const ANALYSIS_RESULT_EVENT_KIND = 6838;

/** Relay event as written to subscribers; `created_at` is in unix seconds. */
export interface RelayEvent {
  kind: number;
  content: string;
  created_at: number;
  tags: string[][];
}

export type EventMessage = ["EVENT", RelayEvent];
export type NoticeMessage = ["NOTICE", string];
export type RelayMessage = EventMessage | NoticeMessage;

export const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

export const createRelayEvent = (input: {
  kind: number;
  content: string;
  createdAt?: Date;
  tags?: string[][];
}): RelayEvent => ({
  kind: input.kind,
  content: input.content,
  created_at: toUnixSeconds(input.createdAt ?? new Date()),
  tags: input.tags ?? [],
});

export const createEventMessage = (event: RelayEvent): EventMessage => ["EVENT", event];

export const createNoticeMessage = (notice: string): NoticeMessage => ["NOTICE", notice];

export const createViewedFileEvent = (filePath: string, createdAt: Date = new Date()): RelayEvent =>
  createRelayEvent({
    kind: VIEWED_FILE_EVENT_KIND,
    content: `Viewed ${filePath}`,
    createdAt,
    tags: [],
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"));

/** Parses an `["EVENT", {...}]` frame; returns undefined for anything else. */
export const parseEventMessage = (raw: string): RelayEvent | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!Array.isArray(parsed) || parsed.length < 2 || parsed[0] !== "EVENT") return undefined;
  const record: unknown = parsed[1];
  if (!isRecord(record)) return undefined;
  if (typeof record.kind !== "number" || typeof record.content !== "string") return undefined;
  const tags = record.tags === undefined ? [] : record.tags;
  if (!isStringMatrix(tags)) return undefined;
  const createdAt = typeof record.created_at === "number" ? record.created_at : toUnixSeconds(new Date());
  return { kind: record.kind, content: record.content, created_at: createdAt, tags };
};

export const findTagValue = (event: RelayEvent, name: string): string | undefined => {
  const tag = event.tags.find((entry) => entry[0] === name);
  return tag?.[1];
};
