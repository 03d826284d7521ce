export type TradeSide = 'buy' | 'sell';

export type TickerUpdate = Readonly<{
	kind: 'ticker';
	symbol: string;
	bidPrice: number;
	bidSize: number;
	askPrice: number;
	askSize: number;
	eventTimeNs: number;
}>;

export type TradeExecution = Readonly<{
	kind: 'trade';
	symbol: string;
	price: number;
	size: number;
	side: TradeSide;
	eventTimeNs: number;
}>;

// Mark/index and funding arrive on separate subjects of the instrument channel.
export type InstrumentUpdate = Readonly<{
	kind: 'instrument';
	symbol: string;
	markPrice: number | null;
	indexPrice: number | null;
	fundingRate: number | null;
	eventTimeNs: number;
}>;

export type MarketEvent = TickerUpdate | TradeExecution | InstrumentUpdate;

export type Candle = {
	/** Unix seconds, inclusive. */
	bucketStart: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	tradeCount: number;
};

export type MarketState = {
	markPrice: number | null;
	indexPrice: number | null;
	fundingRate: number | null;
	lastPrice: number | null;
	lastEventTime: number | null;
};

export type Signal = 'BUY' | 'SELL' | 'HOLD';

export type SignalState = {
	lastSignal: Signal | null;
	lastSignalTime: number | null;
};

export type MacdResult = {
	macd: number;
	signal: number;
	histogram: number;
};

export type SignalEvaluation = {
	signal: Signal;
	time: number;
	rsi: number;
	macd: MacdResult;
	previousHistogram: number;
	suppressed: boolean;
	emitted: boolean;
};

export type Position = {
	symbol: string;
	signedQuantity: number;
	leverage: number;
};

export type OrderResult = {
	orderId: string;
	clientOid: string;
};

/**
 * Narrow command surface of the exchange trading API.
 */
export interface ExecutionAdapter {
	getPosition(symbol: string): Promise<Position | null>;
	setLeverage(symbol: string, leverage: number): Promise<void>;
	closePosition(symbol: string): Promise<OrderResult | null>;
	placeOrder(
		symbol: string,
		side: TradeSide,
		size: number,
		leverage: number
	): Promise<OrderResult>;
}

export type ExecutionResult = {
	success: boolean;
	action: 'OPENED' | 'FLIPPED' | 'CLOSED' | 'SKIPPED' | 'FAILED';
	error?: string;
};

export interface PipelineObserver {
	onEvent?(event: MarketEvent): void;
	onCandleClosed?(candle: Candle, history: readonly Candle[]): void;
	onSignal?(evaluation: SignalEvaluation): void;
}
