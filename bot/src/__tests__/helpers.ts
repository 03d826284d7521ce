import { vi, type Mock } from 'vitest';
import { createLog } from '../logger';
import type {
	ExecutionAdapter,
	InstrumentUpdate,
	TickerUpdate,
	TradeExecution,
} from '../types';

export const SYMBOL = 'SOLUSDTM';

export const silentLog = () => createLog({ silent: true });

export const trade = (second: number, price: number, size = 1): TradeExecution => ({
	kind: 'trade',
	symbol: SYMBOL,
	price,
	size,
	side: 'buy',
	eventTimeNs: second * 1e9,
});

export const ticker = (
	second: number,
	bidPrice: number,
	askPrice: number,
	bidSize = 1,
	askSize = 1
): TickerUpdate => ({
	kind: 'ticker',
	symbol: SYMBOL,
	bidPrice,
	bidSize,
	askPrice,
	askSize,
	eventTimeNs: second * 1e9,
});

export const instrument = (
	second: number,
	fields: Partial<Pick<InstrumentUpdate, 'markPrice' | 'indexPrice' | 'fundingRate'>>
): InstrumentUpdate => ({
	kind: 'instrument',
	symbol: SYMBOL,
	markPrice: fields.markPrice ?? null,
	indexPrice: fields.indexPrice ?? null,
	fundingRate: fields.fundingRate ?? null,
	eventTimeNs: second * 1e9,
});

export type MockAdapter = {
	[K in keyof ExecutionAdapter]: Mock<
		Parameters<ExecutionAdapter[K]>,
		ReturnType<ExecutionAdapter[K]>
	>;
};

const stub = <K extends keyof ExecutionAdapter>() =>
	vi.fn<Parameters<ExecutionAdapter[K]>, ReturnType<ExecutionAdapter[K]>>();

/** Flat account that accepts every call. */
export const mockAdapter = (): MockAdapter => ({
	getPosition: stub<'getPosition'>().mockResolvedValue(null),
	setLeverage: stub<'setLeverage'>().mockResolvedValue(undefined),
	closePosition: stub<'closePosition'>().mockResolvedValue(null),
	placeOrder: stub<'placeOrder'>().mockResolvedValue({
		orderId: 'order-1',
		clientOid: 'client-1',
	}),
});
