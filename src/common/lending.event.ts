export const LENDING_ACTIVITY_ID = "lending.activity";

type ActivityBase = {
	eventId: string;
	/** Unix seconds of the committed operation. */
	at: number;
};

export type DepositActivity = ActivityBase & {
	type: "deposit" | "withdraw";
	user: string;
	asset: string;
	amount: string;
};

export type LoanCreatedActivity = ActivityBase & {
	type: "loan-created";
	loanId: number;
	borrower: string;
	collateralAsset: string;
	borrowAsset: string;
	collateralAmount: string;
	borrowAmount: string;
};

export type LoanRepaidActivity = ActivityBase & {
	type: "loan-repaid";
	loanId: number;
	borrower: string;
	amount: string;
	closed: boolean;
};

export type LoanLiquidatedActivity = ActivityBase & {
	type: "loan-liquidated";
	loanId: number;
	borrower: string;
	liquidator: string;
	repaid: string;
	collateralSeized: string;
	closed: boolean;
};

export type PoolUpdatedActivity = ActivityBase & {
	type: "pool-updated";
	asset: string;
	reason: string;
};

export type ProtocolUpdatedActivity = ActivityBase & {
	type: "protocol-updated";
	paused: boolean;
};

export type LendingActivity =
	| DepositActivity
	| LoanCreatedActivity
	| LoanRepaidActivity
	| LoanLiquidatedActivity
	| PoolUpdatedActivity
	| ProtocolUpdatedActivity;

/** An activity before it is stamped with an event id. */
export type NewActivity = LendingActivity extends infer A
	? A extends unknown
		? Omit<A, "eventId">
		: never
	: never;
