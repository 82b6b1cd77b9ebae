/**
 * @module events
 * Type-safe event definitions published by a composer.
 */

import type { Size } from './common';
import type { Layer } from './layer';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired when a layer is appended or re-inserted. */
  'layer:added': { layer: Layer; index: number };
  /** Fired when a layer is taken out of the list. */
  'layer:removed': { layerId: string; index: number };
  /** Fired when a patch or a visibility toggle changes a layer. */
  'layer:updated': { layerId: string; fields: string[] };
  /** Fired when a layer moves to a new index. */
  'layer:reordered': { layerId: string; from: number; to: number };
  /** Fired when every layer is dropped at once. */
  'composition:cleared': undefined;
  /** Fired after each successful render. */
  'render:completed': { size: Size; layerCount: number; durationMs: number };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
