export class MatchNotFoundError extends Error {
    constructor(readonly matchId: string) {
        super(`Match ${matchId} not found`);
        this.name = 'MatchNotFoundError';
    }
}

/** The request contradicts the match's current state (duplicate id, decided series) */
export class MatchConflictError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MatchConflictError';
    }
}
