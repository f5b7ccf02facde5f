/**
 * API Types
 * Response envelopes used by the HTTP services
 */

import type { ProbabilitySnapshot } from './predictions';

// ============================================
// Common Response Wrappers
// ============================================

export interface ApiSuccess<T> {
    success: true;
    data: T;
    meta?: ResponseMeta;
}

export interface ApiFailure {
    success: false;
    error: ApiError;
}

export type ApiErrorCode =
    | 'VALIDATION_ERROR'
    | 'NOT_FOUND'
    | 'CONFLICT'
    | 'INTERNAL_ERROR'
    | 'SHUTTING_DOWN';

export interface ApiError {
    code: ApiErrorCode;
    message: string;
    details?: Record<string, unknown>;
}

export interface ResponseMeta {
    timestamp: string;
}

// ============================================
// Predictor Payloads
// ============================================

export interface HistoryPayload {
    match_id: string;
    game_number: number;
    count: number;
    snapshots: ProbabilitySnapshot[];
}
