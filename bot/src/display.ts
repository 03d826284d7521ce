import type { CandleAggregator } from './candles';
import { DISPLAY_CONFIG } from './config';
import type { Log } from './logger';
import type { PipelineObserver } from './types';

export type DisplaySource = Pick<CandleAggregator, 'marketState' | 'history'>;

/**
 * Periodic market view: last price, mark/index, funding and the latest candles.
 * Reads snapshots only, so it can never observe a half-built candle.
 */
export class MarketDisplay implements PipelineObserver {
	private lastRender = -Infinity;

	constructor(
		private readonly source: DisplaySource,
		private readonly log: Log,
		private readonly now: () => number = Date.now,
		private readonly candlesShown: number = DISPLAY_CONFIG.CANDLES_SHOWN,
		private readonly intervalMs: number = DISPLAY_CONFIG.INTERVAL_MS
	) {}

	onEvent(): void {
		const now = this.now();
		if (now - this.lastRender < this.intervalMs) return;

		const state = this.source.marketState();
		if (state.lastPrice === null) return;

		this.lastRender = now;
		this.log.market(state, this.source.history().slice(-this.candlesShown));
	}
}
