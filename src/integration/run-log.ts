import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { formatDuration } from '../lib/utils/format.js';

// ── Event types ──

interface EventBase {
  pipeline: string;
  run_id: string;
  seq: number;
  ts: string;
}

export type RunEvent = EventBase &
  (
    | {
        type: 'run:start';
        step_count: number;
        config_file: string | null;
      }
    | {
        type: 'step:passed';
        step: string;
        position: number;
        duration_ms: number;
      }
    | {
        type: 'step:failed';
        step: string;
        position: number;
        duration_ms: number;
        detail: string;
      }
    | {
        type: 'run:completed';
        duration_ms: number;
        steps_passed: number;
      }
    | {
        type: 'run:failed';
        step: string;
        position: number;
        duration_ms: number;
        steps_passed: number;
      }
  );

/** Distributive Omit for union types */
type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never;

export type RunEventInput = DistributiveOmit<RunEvent, 'seq' | 'ts'>;

// ── Event writer ──

export interface EventRecorderOptions {
  jsonLogPath: string;
}

export type EventRecorder = (event: RunEventInput) => RunEvent;

/** Default log location for a pipeline, relative to the working directory */
export function defaultEventLogPath(cwd: string, pipeline: string): string {
  return resolve(cwd, '.provision', pipeline, 'events.jsonl');
}

/** Create a recorder that appends one JSON line per event, numbered from 0 */
export function createEventRecorder(options: EventRecorderOptions): EventRecorder {
  let seq = 0;

  return (event) => {
    const fullEvent: RunEvent = {
      ...event,
      seq: seq++,
      ts: new Date().toISOString(),
    };

    mkdirSync(dirname(options.jsonLogPath), { recursive: true });
    appendFileSync(options.jsonLogPath, JSON.stringify(fullEvent) + '\n');
    return fullEvent;
  };
}

// ── Message formatting ──

export function formatEventMessage(event: RunEventInput): string {
  switch (event.type) {
    case 'run:start':
      return `run:start ${event.pipeline} (${event.step_count} steps)`;

    case 'step:passed':
      return `step:passed ${event.pipeline}/${event.step} (${formatDuration(event.duration_ms)})`;

    case 'step:failed':
      return `step:failed ${event.pipeline}/${event.step}: ${event.detail}`;

    case 'run:completed':
      return `run:completed ${event.pipeline} (${formatDuration(event.duration_ms)}, ${event.steps_passed} passed)`;

    case 'run:failed':
      return `run:failed ${event.pipeline} at ${event.step} (step ${event.position}, ${event.steps_passed} passed)`;
  }
}
