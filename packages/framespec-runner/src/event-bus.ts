// ============================================================================
// Framespec Runner - EventBus
// Decoupled, type-safe event system for the scheduler.
// The console reporter, debug logging and embedders all plug into these events.
// ============================================================================

import { toError } from './isolation.js';
import type { RunSummary, TestOutcome } from './types.js';

// ---------------------------------------------------------------------------
// Event Map - every event and its payload
// ---------------------------------------------------------------------------

/** Identifies the slot being executed */
export interface SlotInfo {
	/** Registry ordinal, or -1 for a focused test */
	index: number;
	title?: string;
	/** Replay counter at the time of the event */
	iteration: number;
}

export interface HarnessEvents {
	// Run lifecycle
	'run:start': { total: number; focused: boolean };
	'run:end': RunSummary;

	// Slot lifecycle
	'test:start': SlotInfo;
	'test:replay': SlotInfo & { delay: number };
	'test:pass': TestOutcome;
	'test:fail': TestOutcome;
	'test:cleanup': { index: number; freed: number };
}

// ---------------------------------------------------------------------------
// Listener type helper
// ---------------------------------------------------------------------------

export type EventListener<K extends keyof HarnessEvents> = (payload: HarnessEvents[K]) => void;

/** Called when a listener throws; the emit carries on with the next listener */
export type ListenerErrorHandler = (event: keyof HarnessEvents, error: unknown) => void;

const warnListenerError: ListenerErrorHandler = (event, error) => {
	console.warn(`[framespec] listener for "${event}" threw: ${toError(error).message}`);
};

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Type-safe, synchronous event bus for the harness.
 *
 * All events are emitted synchronously from the frame callback, so
 * listeners always see them in order.
 *
 * ```ts
 * const bus = new EventBus();
 * bus.on('test:fail', ({ index, error }) => { ... });
 * bus.on('run:end', ({ passes, failures }) => { ... });
 * ```
 */
export class EventBus {
	private listeners = new Map<keyof HarnessEvents, Set<EventListener<never>>>();
	private history: Array<{ event: keyof HarnessEvents; payload: unknown; timestamp: number }> = [];
	private _recordHistory = false;
	private readonly onListenerError: ListenerErrorHandler;

	constructor(onListenerError: ListenerErrorHandler = warnListenerError) {
		this.onListenerError = onListenerError;
	}

	// -----------------------------------------------------------------------
	// Subscription
	// -----------------------------------------------------------------------

	/**
	 * Register a listener for an event.
	 * Returns an unsubscribe function.
	 */
	on<K extends keyof HarnessEvents>(event: K, listener: EventListener<K>): () => void {
		let set = this.listeners.get(event);
		if (!set) {
			set = new Set();
			this.listeners.set(event, set);
		}
		const entries = set;
		entries.add(listener as EventListener<never>);

		return () => {
			entries.delete(listener as EventListener<never>);
			if (entries.size === 0) this.listeners.delete(event);
		};
	}

	// -----------------------------------------------------------------------
	// Emission
	// -----------------------------------------------------------------------

	emit<K extends keyof HarnessEvents>(event: K, payload: HarnessEvents[K]): void {
		if (this._recordHistory) {
			this.history.push({ event, payload, timestamp: Date.now() });
		}

		const set = this.listeners.get(event);
		if (!set) return;

		for (const listener of set) {
			try {
				(listener as EventListener<K>)(payload);
			} catch (error) {
				this.onListenerError(event, error);
			}
		}
	}

	// -----------------------------------------------------------------------
	// History (for debugging / test assertions)
	// -----------------------------------------------------------------------

	enableHistory(): void {
		this._recordHistory = true;
	}

	disableHistory(): void {
		this._recordHistory = false;
		this.history = [];
	}

	/**
	 * Names of recorded events, in emission order.
	 */
	getEventNames(): Array<keyof HarnessEvents> {
		return this.history.map((h) => h.event);
	}

	/**
	 * Get events of a specific type from history.
	 */
	getEventsOfType<K extends keyof HarnessEvents>(
		event: K,
	): Array<{ payload: HarnessEvents[K]; timestamp: number }> {
		return this.history
			.filter((h) => h.event === event)
			.map((h) => ({ payload: h.payload as HarnessEvents[K], timestamp: h.timestamp }));
	}
}
