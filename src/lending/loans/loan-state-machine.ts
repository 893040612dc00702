import {
	StateMachine,
	createState,
	createTransition,
} from "../../common/state-machine";
import type { LoanStatus } from "./loan.entity";

export type LoanAction =
	| "accrue"
	| "repay-partial"
	| "repay-full"
	| "liquidate-partial"
	| "liquidate-full";

export const LOAN_STATE_MACHINE = new StateMachine<LoanStatus, LoanAction>({
	initialState: "active",
	states: [
		createState<LoanStatus, LoanAction>(
			"active",
			[
				"accrue",
				"repay-partial",
				"repay-full",
				"liquidate-partial",
				"liquidate-full",
			],
			{ description: "Debt outstanding, interest accruing" },
		),
		createState<LoanStatus, LoanAction>("repaid", [], {
			isFinal: true,
			description: "Debt fully repaid, collateral released",
		}),
		createState<LoanStatus, LoanAction>("liquidated", [], {
			isFinal: true,
			description: "Debt closed by a liquidator",
		}),
		createState<LoanStatus, LoanAction>("defaulted", [], {
			isFinal: true,
			description: "Reserved",
		}),
	],
	transitions: [
		createTransition<LoanStatus, LoanAction>("active", "accrue", "active"),
		createTransition<LoanStatus, LoanAction>(
			"active",
			"repay-partial",
			"active",
		),
		createTransition<LoanStatus, LoanAction>("active", "repay-full", "repaid"),
		createTransition<LoanStatus, LoanAction>(
			"active",
			"liquidate-partial",
			"active",
		),
		createTransition<LoanStatus, LoanAction>(
			"active",
			"liquidate-full",
			"liquidated",
		),
	],
});
