import type { GameEvent } from '@winline/shared';

export type FeedEventHandler = (event: GameEvent) => void | Promise<void>;

/**
 * Source of normalized game events. Provider connectors translate their own
 * payloads to `GameEvent` and emit them in game-clock order.
 */
export interface FeedConnector {
    readonly name: string;

    /** Resolves once the feed has finished or been stopped */
    start(): Promise<void>;
    stop(): Promise<void>;

    /** Returns an unsubscribe function */
    onEvent(handler: FeedEventHandler): () => void;
}
