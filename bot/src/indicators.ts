import { INDICATOR_CONFIG } from './config';
import type { MacdResult } from './types';

export const NEUTRAL_RSI = 50;

function smooth(values: readonly number[], alpha: number): number[] {
	if (values.length === 0) return [];

	const oneMinusAlpha = 1 - alpha;
	const result: number[] = new Array(values.length);
	result[0] = values[0]!;

	for (let i = 1; i < values.length; i++) {
		result[i] = alpha * values[i]! + oneMinusAlpha * result[i - 1]!;
	}

	return result;
}

/** EMA seeded with the first value, alpha = 2 / (span + 1). */
export function calculateEMA(values: readonly number[], span: number): number[] {
	return smooth(values, 2 / (span + 1));
}

/**
 * RSI with exponential (alpha = 1/period) smoothing of gains and losses,
 * seeded with the first difference. Needs period + 1 closes; returns 50 below that.
 */
export function calculateRSI(
	closes: readonly number[],
	period: number = INDICATOR_CONFIG.RSI_PERIOD
): number {
	if (closes.length < period + 1) return NEUTRAL_RSI;

	const gains: number[] = new Array(closes.length - 1);
	const losses: number[] = new Array(closes.length - 1);

	for (let i = 1; i < closes.length; i++) {
		const delta = closes[i]! - closes[i - 1]!;
		gains[i - 1] = delta > 0 ? delta : 0;
		losses[i - 1] = delta < 0 ? -delta : 0;
	}

	const alpha = 1 / period;
	const avgGain = smooth(gains, alpha)[gains.length - 1]!;
	const avgLoss = smooth(losses, alpha)[losses.length - 1]!;

	if (avgLoss === 0) return 100;

	const rs = avgGain / avgLoss;
	return 100 - 100 / (1 + rs);
}

export function calculateMACD(
	closes: readonly number[],
	fast: number = INDICATOR_CONFIG.MACD_FAST,
	slow: number = INDICATOR_CONFIG.MACD_SLOW,
	signal: number = INDICATOR_CONFIG.MACD_SIGNAL
): MacdResult {
	if (closes.length < slow + signal) {
		return { macd: 0, signal: 0, histogram: 0 };
	}

	const fastEMA = calculateEMA(closes, fast);
	const slowEMA = calculateEMA(closes, slow);

	const macdLine: number[] = new Array(closes.length);
	for (let i = 0; i < closes.length; i++) {
		macdLine[i] = fastEMA[i]! - slowEMA[i]!;
	}

	const signalLine = calculateEMA(macdLine, signal);
	const last = closes.length - 1;
	const macd = macdLine[last]!;
	const signalValue = signalLine[last]!;

	return { macd, signal: signalValue, histogram: macd - signalValue };
}
