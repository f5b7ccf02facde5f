/**
 * Edge Calculator
 *
 * Compares the engine's fair price with a market quote and turns the gap
 * into a recommendation. Raw edge is scaled by engine confidence before it
 * is classified, compared against the minimum or sized.
 *
 * Stateless: every call is independent, there is no hysteresis between
 * consecutive quotes.
 */

import type {
    EdgeQuality,
    EdgeRejection,
    EdgeResult,
    LoggerLike,
    TradeAction,
    TradeUrgency,
} from '@winline/shared';
import { clamp, isOpenUnitInterval, isStale, round } from '@winline/shared';
import { PositionSizer, kellyFraction } from './PositionSizer';
import type { TradingConfig } from './types';

export function computeEdge(fairPrice: number, marketPrice: number): number {
    return fairPrice - marketPrice;
}

/** Threshold ladder on the confidence-adjusted edge */
export function classifyEdge(adjustedEdge: number): TradeAction {
    if (adjustedEdge > 0.05) return 'STRONG_BUY';
    if (adjustedEdge > 0.02) return 'BUY';
    if (adjustedEdge > 0.01) return 'SLIGHT_BUY';
    if (adjustedEdge < -0.05) return 'STRONG_SELL';
    if (adjustedEdge < -0.02) return 'SELL';
    if (adjustedEdge < -0.01) return 'SLIGHT_SELL';
    return 'HOLD';
}

export function edgeQuality(edge: number): EdgeQuality {
    const size = Math.abs(edge);
    if (size < 0.01) return 'none';
    if (size < 0.02) return 'marginal';
    if (size < 0.03) return 'decent';
    if (size < 0.05) return 'good';
    if (size < 0.08) return 'great';
    return 'exceptional';
}

export function edgeUrgency(edge: number): TradeUrgency {
    const size = Math.abs(edge);
    if (size > 0.08) return 'IMMEDIATE';
    if (size > 0.05) return 'HIGH';
    if (size > 0.03) return 'MEDIUM';
    return 'LOW';
}

export interface EdgeInput {
    /** Engine probability for the side being quoted */
    fairPrice: number;
    marketPrice: number;
    confidence: number;

    /** When the quote was observed; omitted quotes are taken as fresh */
    observedAt?: string | number;
    now?: number;

    currentPosition?: number;
}

export interface EdgeCalculatorOptions {
    logger?: LoggerLike;
    sizer?: PositionSizer;
}

export class EdgeCalculator {
    private readonly sizer: PositionSizer;
    private readonly logger?: LoggerLike;

    constructor(private readonly config: TradingConfig, options: EdgeCalculatorOptions = {}) {
        this.sizer = options.sizer ?? new PositionSizer(config);
        this.logger = options.logger;
    }

    evaluate(input: EdgeInput): EdgeResult {
        const { fairPrice, marketPrice } = input;
        const confidence = Number.isNaN(input.confidence) ? 0 : clamp(input.confidence, 0, 1);

        if (!isOpenUnitInterval(marketPrice)) {
            return this.reject(input, confidence, 'invalid_market_price', `Market price ${marketPrice} outside (0, 1)`);
        }
        if (input.observedAt !== undefined && isStale(input.observedAt, this.config.maxPriceAgeMs, input.now)) {
            return this.reject(input, confidence, 'stale_market_price', `Quote older than ${this.config.maxPriceAgeMs}ms`);
        }
        if (!isOpenUnitInterval(fairPrice)) {
            return this.reject(input, confidence, 'invalid_fair_price', `Fair price ${fairPrice} outside (0, 1)`);
        }

        const edge = computeEdge(fairPrice, marketPrice);
        const adjusted = edge * confidence;
        const magnitude = Math.abs(adjusted);

        const result: EdgeResult = {
            fair_price: fairPrice,
            market_price: marketPrice,
            edge,
            adjusted_edge: adjusted,
            confidence,
            side: adjusted > 0 ? 'BUY' : adjusted < 0 ? 'SELL' : null,
            action: classifyEdge(adjusted),
            quality: edgeQuality(adjusted),
            urgency: edgeUrgency(adjusted),
            kelly_fraction: kellyFraction(adjusted, marketPrice),
            recommended_size: 0,
            recommended_shares: 0,
            actionable: false,
            reason: '',
        };

        if (magnitude < this.config.minEdge) {
            result.reason = `Edge ${round(magnitude, 4)} below minimum ${this.config.minEdge}`;
            return result;
        }
        if (magnitude < this.config.slippageBuffer) {
            result.reason = `Edge ${round(magnitude, 4)} below slippage buffer ${this.config.slippageBuffer}`;
            return result;
        }

        const size = this.sizer.size({
            edge: adjusted,
            marketPrice,
            currentPosition: input.currentPosition,
        });

        result.recommended_size = size.size_dollars;
        result.recommended_shares = size.size_shares;
        result.actionable = size.is_valid;
        result.reason = size.is_valid
            ? `${result.side} fair=${round(fairPrice, 3)} market=${round(marketPrice, 3)} edge=${round(adjusted * 100, 1)}%`
            : size.reason;

        if (result.actionable) {
            this.logger?.info('Edge detected', {
                action: result.action,
                fair_price: fairPrice,
                market_price: marketPrice,
                adjusted_edge: adjusted,
                size_dollars: size.size_dollars,
            });
        }

        return result;
    }

    private reject(input: EdgeInput, confidence: number, rejection: EdgeRejection, reason: string): EdgeResult {
        this.logger?.warn('Market quote rejected', {
            rejection,
            market_price: input.marketPrice,
            fair_price: input.fairPrice,
        });

        return {
            fair_price: input.fairPrice,
            market_price: input.marketPrice,
            edge: 0,
            adjusted_edge: 0,
            confidence,
            side: null,
            action: 'HOLD',
            quality: 'none',
            urgency: 'LOW',
            kelly_fraction: 0,
            recommended_size: 0,
            recommended_shares: 0,
            actionable: false,
            rejected: rejection,
            reason,
        };
    }
}
