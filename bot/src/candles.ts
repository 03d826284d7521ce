import type { Candle, MarketEvent, MarketState } from './types';

const NS_PER_SECOND = 1e9;

export const DEFAULT_MAX_HISTORY = 100;

type Tick = { price: number; size: number };

/** Whole seconds; the feed parser keeps large stamps below the next second. */
export const bucketOf = (eventTimeNs: number): number =>
	Math.floor(eventTimeNs / NS_PER_SECOND);

/**
 * Folds market events into 1-second OHLCV candles.
 *
 * Only the current candle is ever mutated. A candle is frozen and appended to
 * the history the moment a newer bucket arrives; late events are dropped.
 * Readers get copies, never the live buffers.
 */
export class CandleAggregator {
	private readonly closed: Candle[] = [];
	private currentCandle: Candle | null = null;
	private droppedLate = 0;
	private readonly state: MarketState = {
		markPrice: null,
		indexPrice: null,
		fundingRate: null,
		lastPrice: null,
		lastEventTime: null,
	};

	constructor(private readonly maxHistory: number = DEFAULT_MAX_HISTORY) {
		if (!Number.isInteger(maxHistory) || maxHistory < 1) {
			throw new RangeError(`maxHistory must be a positive integer, got ${maxHistory}`);
		}
	}

	/** Returns the candle that this event closed, if any. */
	ingest(event: MarketEvent): Candle | null {
		const tick = this.extractTick(event);
		if (!tick) return null;

		const bucket = bucketOf(event.eventTimeNs);
		const current = this.currentCandle;

		if (current && bucket < current.bucketStart) {
			this.droppedLate++;
			return null;
		}

		this.state.lastPrice = tick.price;
		this.state.lastEventTime = bucket;

		if (!current) {
			this.currentCandle = this.openCandle(bucket, tick);
			return null;
		}

		if (bucket === current.bucketStart) {
			current.high = Math.max(current.high, tick.price);
			current.low = Math.min(current.low, tick.price);
			current.close = tick.price;
			current.volume += tick.size;
			current.tradeCount++;
			return null;
		}

		const closed = Object.freeze({ ...current });
		this.closed.push(closed);
		if (this.closed.length > this.maxHistory) {
			this.closed.shift();
		}
		this.currentCandle = this.openCandle(bucket, tick);
		return closed;
	}

	history(): readonly Candle[] {
		return this.closed.slice();
	}

	closes(): number[] {
		return this.closed.map((candle) => candle.close);
	}

	current(): Candle | null {
		return this.currentCandle ? { ...this.currentCandle } : null;
	}

	size(): number {
		return this.closed.length;
	}

	marketState(): MarketState {
		return { ...this.state };
	}

	lateEventCount(): number {
		return this.droppedLate;
	}

	private extractTick(event: MarketEvent): Tick | null {
		let tick: Tick;

		switch (event.kind) {
			case 'ticker':
				tick = {
					price: (event.bidPrice + event.askPrice) / 2,
					size: (event.bidSize + event.askSize) / 2,
				};
				break;
			case 'trade':
				tick = { price: event.price, size: event.size };
				break;
			case 'instrument':
				if (event.markPrice !== null) this.state.markPrice = event.markPrice;
				if (event.indexPrice !== null) this.state.indexPrice = event.indexPrice;
				if (event.fundingRate !== null) this.state.fundingRate = event.fundingRate;
				tick = { price: event.markPrice ?? 0, size: 0 };
				break;
		}

		if (!Number.isFinite(tick.price) || tick.price === 0) return null;
		if (!Number.isFinite(tick.size)) tick.size = 0;
		return tick;
	}

	private openCandle(bucket: number, tick: Tick): Candle {
		return {
			bucketStart: bucket,
			open: tick.price,
			high: tick.price,
			low: tick.price,
			close: tick.price,
			volume: tick.size,
			tradeCount: 1,
		};
	}
}
