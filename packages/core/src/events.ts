/**
 * Progress events for the DOE pipeline
 *
 * Components never print. Each one takes an EventSink and emits typed
 * events; whoever drives the pipeline decides where they go.
 *
 * Usage:
 *   const log = createEventLog();
 *   const report = await synthesizeVariants(input, { sink: log });
 *   log.query({ component: 'synthesis', limit: 20 });
 */

export type EventLevel = 'info' | 'warn' | 'error';

export type DoeComponent =
  | 'setup' | 'geometry' | 'scales' | 'synthesis'
  | 'rescale' | 'batch' | 'copy' | 'server' | 'config';

export interface DoeEvent {
  ts: number;
  component: DoeComponent;
  level: EventLevel;
  message: string;
  data?: Record<string, unknown>;
}

export type DoeEventInput = Omit<DoeEvent, 'ts'>;

export interface EventSink {
  emit(event: DoeEventInput): void;
}

export type EventListener = (event: DoeEvent) => void;

export interface EventLog extends EventSink {
  subscribe(listener: EventListener): () => void;
  query(options?: EventQuery): { entries: DoeEvent[]; uptime_ms: number };
  clear(): void;
}

export interface EventQuery {
  since?: number;
  component?: string;
  level?: EventLevel;
  limit?: number;
}

export interface EventLogOptions {
  /** Ring buffer size (default: 200) */
  maxEntries?: number;
  /** Mirror every event to stderr (default: true) */
  mirror?: boolean;
}

const DEFAULT_MAX_ENTRIES = 200;

/** Sink that drops everything */
export const silentSink: EventSink = {
  emit: () => {},
};

export function formatEvent(event: DoeEventInput): string {
  const prefix = event.level === 'error'
    ? '[piston-doe] ERROR'
    : event.level === 'warn' ? '[piston-doe] WARN' : '[piston-doe]';
  return `${prefix} [${event.component}] ${event.message}`;
}

/**
 * In-memory ring buffer of events, optionally mirrored to stderr.
 */
export function createEventLog(options: EventLogOptions = {}): EventLog {
  const { maxEntries = DEFAULT_MAX_ENTRIES, mirror = true } = options;
  const buffer: DoeEvent[] = [];
  const listeners = new Set<EventListener>();
  const startTs = Date.now();

  return {
    emit(input) {
      const event: DoeEvent = { ts: Date.now(), ...input };
      buffer.push(event);
      if (buffer.length > maxEntries) {
        buffer.shift();
      }

      if (mirror) {
        console.error(formatEvent(input));
      }

      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          // A broken subscriber must not break the pipeline
          console.error(`[piston-doe] Event listener failed: ${error}`);
        }
      }
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    query(queryOptions = {}) {
      const { since, component, level, limit = 100 } = queryOptions;
      let entries = buffer.slice();

      if (since) {
        entries = entries.filter(e => e.ts > since);
      }
      if (component) {
        entries = entries.filter(e => e.component === component);
      }
      if (level) {
        entries = entries.filter(e => e.level === level);
      }
      if (entries.length > limit) {
        entries = entries.slice(-limit);
      }

      return { entries, uptime_ms: Date.now() - startTs };
    },

    clear() {
      buffer.length = 0;
    },
  };
}

/**
 * Run an operation and emit one closing event with its duration.
 *
 * @param summarize - Extracts success and extra fields from the result
 */
export async function timeOperation<T>(
  sink: EventSink,
  component: DoeComponent,
  operation: string,
  run: () => Promise<T>,
  summarize?: (result: T) => { success: boolean; message?: string; data?: Record<string, unknown> }
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await run();
    const summary = summarize?.(result) ?? { success: true };
    sink.emit({
      component,
      level: summary.success ? 'info' : 'warn',
      message: summary.message ?? `${operation} finished`,
      data: {
        operation,
        success: summary.success,
        duration_ms: Date.now() - startTime,
        ...summary.data,
      },
    });
    return result;
  } catch (error) {
    sink.emit({
      component,
      level: 'error',
      message: `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
      data: { operation, success: false, duration_ms: Date.now() - startTime },
    });
    throw error;
  }
}
