import { calculateMACD, calculateRSI } from './indicators';
import type { MacdResult, Signal, SignalEvaluation, SignalState } from './types';

export type SignalSettings = {
	rsiLower: number;
	rsiUpper: number;
	signalBufferSeconds: number;
	minHistory: number;
};

export type IndicatorSet = {
	rsi: (closes: readonly number[]) => number;
	macd: (closes: readonly number[]) => MacdResult;
};

const defaultIndicators: IndicatorSet = {
	rsi: (closes) => calculateRSI(closes),
	macd: (closes) => calculateMACD(closes),
};

/**
 * RSI threshold + MACD histogram crossover signal with an emission cooldown.
 */
export class SignalGenerator {
	private lastSignal: Signal | null = null;
	private lastSignalTime: number | null = null;

	constructor(
		private readonly settings: SignalSettings,
		private readonly indicators: IndicatorSet = defaultIndicators
	) {}

	/**
	 * @param closes closed-candle close prices, oldest first
	 * @param time seconds; the cooldown is measured on this clock
	 * @returns null until `minHistory` closes are available
	 */
	evaluate(closes: readonly number[], time: number): SignalEvaluation | null {
		if (closes.length < this.settings.minHistory) return null;

		const rsi = this.indicators.rsi(closes);
		const macd = this.indicators.macd(closes);
		const previousHistogram = this.indicators.macd(closes.slice(0, -1)).histogram;

		let candidate: Signal = 'HOLD';
		if (
			rsi < this.settings.rsiLower ||
			(macd.histogram > 0 && previousHistogram <= 0)
		) {
			candidate = 'BUY';
		}
		// SELL is checked second, so it wins when both fire.
		if (
			rsi > this.settings.rsiUpper ||
			(macd.histogram < 0 && previousHistogram >= 0)
		) {
			candidate = 'SELL';
		}

		const evaluation: SignalEvaluation = {
			signal: candidate,
			time,
			rsi,
			macd,
			previousHistogram,
			suppressed: false,
			emitted: false,
		};

		if (candidate === 'HOLD') return evaluation;

		if (this.inCooldown(time)) {
			evaluation.suppressed = true;
			return evaluation;
		}

		this.lastSignal = candidate;
		this.lastSignalTime = time;
		evaluation.emitted = true;
		return evaluation;
	}

	state(): SignalState {
		return { lastSignal: this.lastSignal, lastSignalTime: this.lastSignalTime };
	}

	private inCooldown(time: number): boolean {
		return (
			this.lastSignalTime !== null &&
			time - this.lastSignalTime < this.settings.signalBufferSeconds
		);
	}
}
