/**
 * Position Sizer
 *
 * Fractional Kelly with hard caps. A sell signal buys the opposite (NO)
 * share, so its price is 1 - market.
 */

import type { PositionSize } from '@winline/shared';
import { round } from '@winline/shared';
import type { TradingConfig } from './types';

/** Full Kelly for a binary share; 0 when there is no edge or the price is degenerate */
export function kellyFraction(edge: number, marketPrice: number): number {
    if (!Number.isFinite(edge) || !(marketPrice > 0 && marketPrice < 1)) return 0;
    if (edge > 0) return edge / (1 - marketPrice);
    if (edge < 0) return -edge / marketPrice;
    return 0;
}

export interface SizeRequest {
    /** Signed, confidence-adjusted edge */
    edge: number;
    marketPrice: number;

    /** Shares already held on the side being traded */
    currentPosition?: number;
}

function rejected(kelly: number, reason: string): PositionSize {
    return {
        size_dollars: 0,
        size_shares: 0,
        size_percent: 0,
        kelly_fraction: kelly,
        is_valid: false,
        reason,
    };
}

export class PositionSizer {
    constructor(private readonly config: TradingConfig) { }

    size(request: SizeRequest): PositionSize {
        const { edge, marketPrice } = request;
        const kelly = kellyFraction(edge, marketPrice);

        if (kelly <= 0) {
            return rejected(0, 'No edge');
        }

        const sharePrice = edge > 0 ? marketPrice : 1 - marketPrice;
        const stakePercent = Math.min(kelly * this.config.kellyMultiplier, this.config.maxStakePercent);
        let dollars = Math.min(stakePercent * this.config.bankroll, this.config.maxTradeDollars);
        let shares = dollars / sharePrice;

        const room = this.config.maxPosition - (request.currentPosition ?? 0);
        if (room <= 0) {
            return rejected(kelly, `At maximum position (${this.config.maxPosition} shares)`);
        }
        if (shares > room) {
            shares = room;
            dollars = shares * sharePrice;
        }

        if (dollars < this.config.minTradeSize) {
            return rejected(kelly, `Size $${dollars.toFixed(2)} below minimum $${this.config.minTradeSize}`);
        }

        return {
            size_dollars: dollars,
            size_shares: shares,
            size_percent: dollars / this.config.bankroll,
            kelly_fraction: kelly,
            is_valid: true,
            reason: `Kelly ${round(kelly * 100, 1)}% x ${this.config.kellyMultiplier} -> $${dollars.toFixed(2)}`,
        };
    }
}
