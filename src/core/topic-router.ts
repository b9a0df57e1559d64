import type { Logger } from "../logger.js";
import { PayloadError, asErrorMessage } from "./errors.js";
import type { DisplayState, GameRecord } from "./entity-registry.js";

export type TopicCategory = "entity" | "response" | "connection";
export type TopicKind = "state" | "cover" | "release" | "snapshot" | "availability";

export type TopicAddress = Readonly<{
  base: string;
  category: TopicCategory;
  kind: TopicKind;
  id?: string;
  suffix?: string;
}>;

export type RouteResult =
  | { kind: "ignored"; reason: "foreign" | "malformed" }
  | { kind: "dispatched"; address: TopicAddress; outcome: "ok" }
  | { kind: "dispatched"; address: TopicAddress; outcome: "payload-error"; error: string };

export type RouterDiagnostics = {
  dispatched: number;
  ignored: number;
  malformed: number;
  payloadErrors: number;
  skippedRecords: number;
};

export type RouteHandlers = {
  onState: (id: string, state: DisplayState) => void;
  onRelease: (record: GameRecord) => void;
  onCover: (id: string, raw: Buffer) => Promise<void>;
  onSnapshot: (records: GameRecord[]) => void;
  onRemoteOnline: () => void;
};

type TopicPattern = {
  segments: string[];
  category: TopicCategory;
  kind: TopicKind;
  suffix?: string;
};

/** Relative to the topic base; `+` captures the game id. */
const TOPIC_PATTERNS: TopicPattern[] = [
  { segments: ["entity", "release", "+", "state"], category: "entity", kind: "state", suffix: "state" },
  {
    segments: ["entity", "release", "+", "asset", "cover"],
    category: "entity",
    kind: "cover",
    suffix: "asset/cover",
  },
  { segments: ["entity", "release", "+"], category: "entity", kind: "release" },
  { segments: ["response", "game", "state"], category: "response", kind: "snapshot" },
  { segments: ["connection"], category: "connection", kind: "availability" },
];

const STATE_TOKENS: Record<string, DisplayState> = {
  started: "started",
  starting: "started",
  running: "started",
  stopped: "stopped",
  stopping: "stopped",
  exited: "stopped",
};

function matchPattern(pattern: TopicPattern, segments: string[]): string | null | false {
  if (pattern.segments.length !== segments.length) return false;
  let id: string | null = null;
  for (let i = 0; i < segments.length; i += 1) {
    const expected = pattern.segments[i];
    const actual = segments[i];
    if (expected === "+") {
      if (actual.length === 0) return false;
      id = actual;
    } else if (expected !== actual) {
      return false;
    }
  }
  return id;
}

export function parseTopic(topicBase: string, topic: string): TopicAddress | "foreign" | "malformed" {
  const prefix = `${topicBase}/`;
  if (!topic.startsWith(prefix)) return "foreign";
  const segments = topic.slice(prefix.length).split("/");
  for (const pattern of TOPIC_PATTERNS) {
    const id = matchPattern(pattern, segments);
    if (id === false) continue;
    const address: TopicAddress = {
      base: topicBase,
      category: pattern.category,
      kind: pattern.kind,
      ...(id !== null ? { id } : {}),
      ...(pattern.suffix ? { suffix: pattern.suffix } : {}),
    };
    return Object.freeze(address);
  }
  return "malformed";
}

function parsePayload(raw: Buffer): unknown {
  const text = raw.toString("utf8").trim();
  if (text.length === 0) return "";
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Maps a state token; `undefined` means there is no token to map. */
export function parseStateToken(value: unknown): DisplayState | undefined {
  if (typeof value !== "string") return undefined;
  const token = value.trim().toLowerCase();
  if (token.length === 0) return undefined;
  return STATE_TOKENS[token] ?? "unknown";
}

function parseGameRecord(value: unknown, fallbackId?: string): GameRecord | null {
  if (!isRecord(value)) return null;
  const id = typeof value.id === "string" && value.id.length > 0 ? value.id : fallbackId;
  if (!id) return null;
  const record: GameRecord = { id };
  if (typeof value.name === "string" && value.name.trim().length > 0) record.name = value.name.trim();
  if (typeof value.isInstalled === "boolean") record.installed = value.isInstalled;
  const state = parseStateToken(value.state);
  if (state) record.state = state;
  return record;
}

function snapshotEntries(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    if (Array.isArray(payload.games)) return payload.games;
    return [payload];
  }
  return null;
}

/**
 * Classifies inbound messages under the configured topic base and hands their
 * payloads to the registry, the cover pipeline or the dispatcher.
 */
export class TopicRouter {
  private diagnostics: RouterDiagnostics = {
    dispatched: 0,
    ignored: 0,
    malformed: 0,
    payloadErrors: 0,
    skippedRecords: 0,
  };

  constructor(
    private readonly topicBase: string,
    private readonly handlers: RouteHandlers,
    private readonly logger: Logger,
  ) {}

  getDiagnostics(): RouterDiagnostics {
    return { ...this.diagnostics };
  }

  /** `retained` marks a message the broker replayed from its store on subscribe. */
  async route(topic: string, payload: Buffer, retained = false): Promise<RouteResult> {
    const address = parseTopic(this.topicBase, topic);
    if (address === "foreign") {
      return { kind: "ignored", reason: "foreign" };
    }
    if (address === "malformed") {
      this.diagnostics.ignored += 1;
      this.diagnostics.malformed += 1;
      this.logger.debug({ topic }, "Ignoring unrecognized topic");
      return { kind: "ignored", reason: "malformed" };
    }

    this.diagnostics.dispatched += 1;
    try {
      await this.dispatch(address, payload, retained);
      return { kind: "dispatched", address, outcome: "ok" };
    } catch (error) {
      if (!(error instanceof PayloadError)) throw error;
      this.diagnostics.payloadErrors += 1;
      this.logger.warn({ topic, kind: address.kind, error: error.message }, "Dropping malformed payload");
      return { kind: "dispatched", address, outcome: "payload-error", error: error.message };
    }
  }

  private async dispatch(address: TopicAddress, payload: Buffer, retained: boolean): Promise<void> {
    switch (address.kind) {
      case "state":
        this.handleState(requireId(address), payload);
        return;
      case "cover":
        if (payload.length === 0) throw new PayloadError("Empty cover payload");
        await this.handlers.onCover(requireId(address), payload);
        return;
      case "release":
        this.handleRelease(requireId(address), payload);
        return;
      case "snapshot":
        this.handleSnapshot(payload);
        return;
      case "availability":
        this.handleAvailability(payload, retained);
        return;
    }
  }

  private handleState(id: string, payload: Buffer): void {
    const parsed = parsePayload(payload);
    const token = isRecord(parsed) ? parsed.state : parsed;
    const state = parseStateToken(token);
    if (!state) throw new PayloadError(token === "" ? "Empty state payload" : "State payload is not a token");
    if (state === "unknown") {
      this.logger.warn({ id, token }, "Unrecognized state token");
    }
    this.handlers.onState(id, state);
  }

  private handleRelease(id: string, payload: Buffer): void {
    const parsed = parsePayload(payload);
    const record = parseGameRecord(parsed, id);
    if (!record) throw new PayloadError("Release payload is not a game record");
    if (record.id !== id) throw new PayloadError(`Release payload id ${record.id} does not match topic id ${id}`);
    this.handlers.onRelease(record);
  }

  private handleSnapshot(payload: Buffer): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload.toString("utf8")) as unknown;
    } catch (error) {
      throw new PayloadError(`Snapshot is not JSON: ${asErrorMessage(error)}`);
    }
    const entries = snapshotEntries(parsed);
    if (!entries) throw new PayloadError("Snapshot is not a list of game records");

    const records: GameRecord[] = [];
    for (const entry of entries) {
      const record = parseGameRecord(entry);
      if (record) {
        records.push(record);
      } else {
        this.diagnostics.skippedRecords += 1;
      }
    }
    if (records.length < entries.length) {
      this.logger.warn({ skipped: entries.length - records.length }, "Skipped snapshot records without id");
    }
    this.handlers.onSnapshot(records);
  }

  private handleAvailability(payload: Buffer, retained: boolean): void {
    const status = payload.toString("utf8").trim().toLowerCase();
    this.logger.info({ status, retained }, "Library agent connection status");
    // A retained status is replayed on every subscribe, which already requests the library.
    if (status === "online" && !retained) this.handlers.onRemoteOnline();
  }
}

function requireId(address: TopicAddress): string {
  if (!address.id) throw new PayloadError(`Topic kind ${address.kind} carries no id`);
  return address.id;
}
