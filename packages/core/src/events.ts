/**
 * @module events
 * Typed event definitions for workflow runs and publishing fan-out.
 *
 * The core uses Node's EventEmitter with string event names.
 * This module defines the payload shapes and a typed emitter wrapper.
 */

import { EventEmitter } from 'node:events';
import type { PlatformResult, StageName, WorkflowState } from './types.js';

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export interface WorkflowStartEvent {
  runId: string;
  audioRef: string;
  languageCode: string;
}

export interface WorkflowCompleteEvent {
  runId: string;
  state: WorkflowState;
  episodeId?: string;
  durationMs: number;
}

export interface WorkflowErrorEvent {
  runId: string;
  error: Error;
  /** Stage that aborted the run; absent for input errors. */
  stage?: StageName;
}

export interface StageStartEvent {
  stage: StageName;
}

export interface StageProgressEvent {
  stage: StageName;
  message: string;
  /** Optional 0–100 percentage. */
  percent?: number;
}

export interface StageCompleteEvent {
  stage: StageName;
  durationMs: number;
}

export interface StageErrorEvent {
  stage: StageName;
  error: Error;
}

export interface PlatformStartEvent {
  platform: string;
  episodeId: string;
}

export interface PlatformCompleteEvent {
  platform: string;
  result: PlatformResult;
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Event name → payload mapping
// ---------------------------------------------------------------------------

export interface WorkflowEventMap {
  'workflow:start': WorkflowStartEvent;
  'workflow:complete': WorkflowCompleteEvent;
  'workflow:error': WorkflowErrorEvent;
  'stage:start': StageStartEvent;
  'stage:progress': StageProgressEvent;
  'stage:complete': StageCompleteEvent;
  'stage:error': StageErrorEvent;
  'platform:start': PlatformStartEvent;
  'platform:complete': PlatformCompleteEvent;
}

// ---------------------------------------------------------------------------
// Typed emitter
// ---------------------------------------------------------------------------

type Listener<K extends keyof WorkflowEventMap> = (payload: WorkflowEventMap[K]) => void;

/**
 * A strongly-typed EventEmitter.
 * Consumers get autocomplete on event names and payloads.
 */
export class WorkflowEmitter {
  private ee = new EventEmitter();

  /** Set maximum listeners (default 20 to allow one subscription per platform). */
  constructor(maxListeners = 20) {
    this.ee.setMaxListeners(maxListeners);
  }

  on<K extends keyof WorkflowEventMap>(event: K, listener: Listener<K>): this {
    this.ee.on(event, listener);
    return this;
  }

  once<K extends keyof WorkflowEventMap>(event: K, listener: Listener<K>): this {
    this.ee.once(event, listener);
    return this;
  }

  off<K extends keyof WorkflowEventMap>(event: K, listener: Listener<K>): this {
    this.ee.off(event, listener);
    return this;
  }

  emit<K extends keyof WorkflowEventMap>(event: K, payload: WorkflowEventMap[K]): boolean {
    return this.ee.emit(event, payload);
  }

  removeAllListeners(event?: keyof WorkflowEventMap): this {
    this.ee.removeAllListeners(event);
    return this;
  }
}
