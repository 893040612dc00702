/**
 * Table-driven state machine for record lifecycles.
 *
 * Unlike a stateful machine instance, this one is a pure lookup: records
 * keep their own status column and ask the machine where an action leads.
 */

export interface StateDefinition<TState extends string, TAction extends string> {
	name: TState;
	allowedActions: readonly TAction[];
	isFinal: boolean;
	description?: string;
}

export interface StateTransition<TState extends string, TAction extends string> {
	from: TState | readonly TState[];
	action: TAction;
	to: TState;
}

export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
> {
	initialState: TState;
	states: readonly StateDefinition<TState, TAction>[];
	transitions: readonly StateTransition<TState, TAction>[];
}

export class StateTransitionError extends Error {
	constructor(
		message: string,
		readonly state: string,
		readonly action: string,
	) {
		super(message);
		this.name = "StateTransitionError";
	}
}

export class StateMachine<TState extends string, TAction extends string> {
	private readonly stateMap = new Map<
		TState,
		StateDefinition<TState, TAction>
	>();
	private readonly transitionMap = new Map<string, TState>();

	constructor(readonly config: StateMachineConfig<TState, TAction>) {
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}
		for (const transition of config.transitions) {
			const froms: readonly TState[] =
				typeof transition.from === "string"
					? [transition.from]
					: transition.from;
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition.to);
			}
		}
	}

	canPerform(state: TState, action: TAction): boolean {
		const definition = this.stateMap.get(state);
		return (
			(definition?.allowedActions.includes(action) ?? false) &&
			this.transitionMap.has(`${state}:${action}`)
		);
	}

	/**
	 * @returns the state reached by performing the action
	 * @throws StateTransitionError if the action is not allowed
	 */
	next(state: TState, action: TAction): TState {
		const to = this.transitionMap.get(`${state}:${action}`);
		if (to === undefined || !this.canPerform(state, action)) {
			throw new StateTransitionError(
				`Action "${action}" is not allowed from state "${state}"`,
				state,
				action,
			);
		}
		return to;
	}

	isFinal(state: TState): boolean {
		return this.stateMap.get(state)?.isFinal ?? false;
	}

	allowedActions(state: TState): readonly TAction[] {
		return this.stateMap.get(state)?.allowedActions ?? [];
	}
}

export function createState<TState extends string, TAction extends string>(
	name: TState,
	allowedActions: readonly TAction[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

export function createTransition<TState extends string, TAction extends string>(
	from: TState | readonly TState[],
	action: TAction,
	to: TState,
): StateTransition<TState, TAction> {
	return { from, action, to };
}
