// src/stateMachine/AbstractStateMachine.ts

import type { ILogger } from '../@types/index.ts';
import { toError } from '../utils/errors/errors.ts';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
}

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;
    private haltState: S | null = null;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Executes the state transitions defined in `stateTransitions` in order, updating the state
     * before invoking each handler. A handler may call `halt` to end the run in a terminal state
     * of its choosing; otherwise the machine ends in the completion state. A thrown error moves
     * the machine into the error state and is passed to `handleError`.
     *
     * @return The state the machine ended in.
     */
    async run(): Promise<S> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.bind(this)();
                if (this.haltState !== null) {
                    this.transitionTo(this.haltState);
                    return this.state;
                }
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const err = toError(error);
            this.transitionTo(this.getErrorState(), err);
            this.handleError(err);
        }
        return this.state;
    }

    protected get halted(): boolean {
        return this.haltState !== null;
    }

    /**
     * Requests that the run stops after the current handler and settles in `terminalState`.
     */
    protected halt(terminalState: S): void {
        this.haltState = terminalState;
    }

    /**
     * Moves to `nextState`. Entering the error state with an error logs the error; any other
     * transition is logged at debug level when verbose.
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`Error occurred during "${String(this.state)}": ${error.message}`);
            this.state = this.getErrorState();
        } else {
            if (this.options.verbose) {
                logger.debug(`STATE :: Transitioning from state "${String(this.state)}" -> "${String(nextState)}"`);
            }
            this.state = nextState;
        }
    }

    /**
     * Handles errors by re-throwing them. Machines whose failures are outcomes rather than
     * exceptions override this.
     */
    protected handleError(error: Error): void {
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
