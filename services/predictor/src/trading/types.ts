/**
 * Trading configuration, built from the environment by `buildTradingConfig()`
 */
export interface TradingConfig {
    /** Dollars available to the sizer */
    bankroll: number;

    /** Fraction of full Kelly actually staked (0.25 = quarter Kelly) */
    kellyMultiplier: number;

    /** Hard cap on one trade as a fraction of bankroll */
    maxStakePercent: number;
    maxTradeDollars: number;
    minTradeSize: number;

    /** Maximum shares held on one side */
    maxPosition: number;

    /** Confidence-adjusted edge needed before sizing */
    minEdge: number;
    slippageBuffer: number;

    /** Quotes older than this are rejected */
    maxPriceAgeMs: number;
}

export const DEFAULT_TRADING_CONFIG: TradingConfig = {
    bankroll: 1000,
    kellyMultiplier: 0.25,
    maxStakePercent: 0.05,
    maxTradeDollars: 50,
    minTradeSize: 5,
    maxPosition: 100,
    minEdge: 0.015,
    slippageBuffer: 0.005,
    maxPriceAgeMs: 10000,
};
