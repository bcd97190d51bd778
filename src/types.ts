export interface Message {
  readonly id: number;
  readonly timestamp: Date;
  readonly body: string;
  readonly hasMedia: boolean;
}

export const FORWARD_MODES = ['today', 'new', 'daily', 'listen'] as const;
export type ForwardMode = (typeof FORWARD_MODES)[number];

export const FORWARD_ORDERS = ['batch', 'one_by_one'] as const;
export type ForwardOrder = (typeof FORWARD_ORDERS)[number];

export const FORWARD_TARGETS = ['list', 'all'] as const;
export type ForwardTarget = (typeof FORWARD_TARGETS)[number];

/** How a mode picks its candidates: by time window or by watermark. */
export type SelectionKind = 'window' | 'watermark';

export type AllowedWindow =
  | { kind: 'always' }
  | { kind: 'hours'; startHour: number; endHour: number };

export interface ForwardConfig {
  sourceChannel: string;
  destinations: readonly string[];
  forwardTo: ForwardTarget;
  mode: ForwardMode;
  order: ForwardOrder;
  cronSchedule: string;
  window: AllowedWindow;
  timezone: string;
  pacingSeconds: number;
}

export type FetchCursor =
  | { kind: 'window'; since: Date; until: Date }
  | { kind: 'watermark'; afterId: number };

// --- Transport abstraction ---

export interface MessageSource {
  /** Yields messages matching the cursor in ascending id order. */
  fetchMessages(channel: string, cursor: FetchCursor): AsyncIterable<Message>;
  latestMessageId(channel: string): Promise<number | null>;
}

export interface SendOutcome {
  destination: string;
  ok: boolean;
  error?: string;
}

export interface MessageSender {
  sendText(destination: string, body: string): Promise<void>;
  /** Optional: one call covering every destination. */
  sendTextBatch?(destinations: readonly string[], body: string): Promise<SendOutcome[]>;
}

export type OnSourceMessage = (message: Message) => void;
export type Unsubscribe = () => void;

export interface MessageSubscriber {
  subscribe(channel: string, onMessage: OnSourceMessage): Unsubscribe;
}

export interface GroupDirectory {
  listPublicGroups(): Promise<string[]>;
}

export type Transport = MessageSource & MessageSender & Partial<GroupDirectory>;

// --- Delivery ---

export interface DeliveryEntry {
  messageId: number;
  destination: string;
  outcome: 'sent' | 'failed';
  error?: string;
}

export type DeliveryHalt =
  | { reason: 'cancelled' }
  | { reason: 'source_error'; error: unknown }
  | { reason: 'persist_error'; error: unknown };

export interface DeliveryReport {
  entries: DeliveryEntry[];
  /** Messages whose full destination pass completed, in delivery order. */
  settledIds: number[];
  /** Messages whose destination pass was started. */
  attempted: number;
  halted: DeliveryHalt | null;
}

export type CycleTrigger = 'cron' | 'listen' | 'manual';

export type CycleStatus =
  | 'gate_closed'
  | 'no_destinations'
  | 'baseline'
  | 'idle'
  | 'delivered'
  | 'failed'
  | 'skipped';

export interface CycleResult {
  status: CycleStatus;
  report?: DeliveryReport;
  error?: string;
}

export interface CycleRunLog {
  source_channel: string;
  trigger: CycleTrigger;
  mode: ForwardMode;
  run_at: string;
  duration_ms: number;
  status: CycleStatus;
  messages: number;
  failures: number;
  error: string | null;
}
