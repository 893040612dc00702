import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import { LENDING_ACTIVITY_ID, LendingActivity } from "./lending.event";

export type SseEvent<T = LendingActivity> = {
	data: T;
};

function involves(activity: LendingActivity, account: string): boolean {
	switch (activity.type) {
		case "deposit":
		case "withdraw":
			return activity.user === account;
		case "loan-created":
		case "loan-repaid":
			return activity.borrower === account;
		case "loan-liquidated":
			return activity.liquidator === account || activity.borrower === account;
		case "pool-updated":
		case "protocol-updated":
			return true;
	}
}

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<LendingActivity>();

	get lendingEvents() {
		return this.events$.asObservable();
	}

	accountEvents(account?: string) {
		if (account) {
			return this.events$.pipe(filter((e) => involves(e, account)));
		}
		return this.events$.asObservable();
	}

	@OnEvent(LENDING_ACTIVITY_ID)
	onActivity(activity: LendingActivity) {
		this.events$.next(activity);
	}
}
