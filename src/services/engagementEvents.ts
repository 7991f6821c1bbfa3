/**
 * Typed event bus between the engines and the presentation layer.
 *
 * Engines emit after their writes commit. Listener failures are logged and
 * never reach the emitter.
 *
 * @module services/engagementEvents
 */

import { StructuredLogger } from "../utils/logger";
import type { Giveaway, GiveawayResolution } from "./giveawayService";
import type { LevelUp } from "./levelingService";

export interface EngagementEventMap {
	levelUp: LevelUp;
	giveawayResolved: GiveawayResolution;
	giveawayCancelled: Giveaway;
}

export type EngagementEvent = keyof EngagementEventMap;

type Listener<K extends EngagementEvent> = (
	payload: EngagementEventMap[K],
) => void | Promise<void>;

type ListenerTable = { [K in EngagementEvent]: Set<Listener<K>> };

export class EngagementEvents {
	private readonly listeners: ListenerTable = {
		levelUp: new Set(),
		giveawayResolved: new Set(),
		giveawayCancelled: new Set(),
	};

	/**
	 * Subscribes to an event.
	 * @returns a function that removes the subscription
	 */
	on<K extends EngagementEvent>(event: K, listener: Listener<K>): () => void {
		this.listeners[event].add(listener);
		return () => {
			this.listeners[event].delete(listener);
		};
	}

	emit<K extends EngagementEvent>(event: K, payload: EngagementEventMap[K]): void {
		for (const listener of this.listeners[event]) {
			try {
				const result = listener(payload);
				if (result instanceof Promise) {
					result.catch((error: unknown) => {
						StructuredLogger.logError(error, { operation: `event_${event}` });
					});
				}
			} catch (error) {
				StructuredLogger.logError(error, { operation: `event_${event}` });
			}
		}
	}

	removeAllListeners(): void {
		this.listeners.levelUp.clear();
		this.listeners.giveawayResolved.clear();
		this.listeners.giveawayCancelled.clear();
	}
}

export const engagementEvents = new EngagementEvents();
