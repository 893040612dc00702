import { Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import { toError } from "../common/errors";
import {
	LENDING_ACTIVITY_ID,
	LendingActivity,
	NewActivity,
} from "../common/lending.event";

export const ACTIVITY_NOTIFIER = Symbol("ACTIVITY_NOTIFIER");

export type NotificationResult =
	| { delivered: true; eventId: string }
	| { delivered: false; eventId: string; error: Error };

/**
 * Receives committed lending activity (rewards accounting, streams, audit).
 * A failing notifier never rolls back the operation that produced it.
 */
export interface ActivityNotifier {
	notify(activity: LendingActivity): Promise<void>;
}

/**
 * Calls the notifier and turns its outcome into a value for the caller to
 * inspect or ignore.
 */
export async function dispatchActivity(
	notifier: ActivityNotifier,
	activity: NewActivity,
	logger: Logger,
): Promise<NotificationResult> {
	const event: LendingActivity = { ...activity, eventId: nanoid(8) };
	try {
		await notifier.notify(event);
		return { delivered: true, eventId: event.eventId };
	} catch (e) {
		const error = toError(e);
		logger.warn(
			`Activity ${event.type} ${event.eventId} not delivered: ${error.message}`,
		);
		return { delivered: false, eventId: event.eventId, error };
	}
}

@Injectable()
export class EventEmitterActivityNotifier implements ActivityNotifier {
	constructor(private readonly events: EventEmitter2) {}

	async notify(activity: LendingActivity): Promise<void> {
		// emitAsync rejects when a listener throws
		await this.events.emitAsync(LENDING_ACTIVITY_ID, activity);
	}
}
