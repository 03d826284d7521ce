import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BotState, TradingBot, type FeedConnector, type TradingConfig } from '../bot';
import type { MarketEvent, PipelineObserver, SignalEvaluation } from '../types';
import { SYMBOL, mockAdapter, silentLog, trade, type MockAdapter } from './helpers';

const config: TradingConfig = {
	symbol: SYMBOL,
	leverage: 5,
	positionSize: 1,
	rsiLower: 40,
	rsiUpper: 60,
	signalBufferSeconds: 3,
	maxHistory: 40,
};

const fakeFeed = () => {
	let listener: ((event: MarketEvent) => void) | null = null;
	const handle = { stop: vi.fn(), isConnected: () => listener !== null };
	const connector: FeedConnector = {
		connect: vi.fn((_symbol: string, onEvent: (event: MarketEvent) => void) => {
			listener = onEvent;
			return handle;
		}),
	};
	return {
		connector,
		handle,
		push: (event: MarketEvent) => listener?.(event),
	};
};

// One trade per second, each lower than the last.
const decline = (seconds: number) =>
	Array.from({ length: seconds }, (_, second) => trade(second, 200 - second));

describe('TradingBot', () => {
	let adapter: MockAdapter;
	let feed: ReturnType<typeof fakeFeed>;
	let bot: TradingBot;

	beforeEach(() => {
		adapter = mockAdapter();
		feed = fakeFeed();
		bot = new TradingBot({
			config,
			log: silentLog(),
			adapter,
			feed: feed.connector,
			retryDelayMs: 0,
		});
	});

	it('turns a steady decline into one BUY order', async () => {
		const evaluations: SignalEvaluation[] = [];
		bot.addObserver({ onSignal: (evaluation) => evaluations.push(evaluation) });

		await expect(bot.initialize()).resolves.toEqual({ success: true });
		bot.start();
		decline(42).forEach(feed.push);
		await bot.idle();

		expect(feed.connector.connect).toHaveBeenCalledWith(SYMBOL, expect.any(Function));
		expect(adapter.placeOrder).toHaveBeenCalledTimes(1);
		expect(adapter.placeOrder).toHaveBeenCalledWith(SYMBOL, 'buy', 1, 5);
		expect(evaluations.map(({ signal, time, emitted, suppressed }) => ({
			signal,
			time,
			emitted,
			suppressed,
		}))).toEqual([
			{ signal: 'BUY', time: 39, emitted: true, suppressed: false },
			{ signal: 'BUY', time: 40, emitted: false, suppressed: true },
		]);
		expect(bot.snapshot()).toMatchObject({
			state: BotState.RUNNING,
			closedCandles: 40,
			signal: { lastSignal: 'BUY', lastSignalTime: 39 },
			executions: 1,
		});
	});

	it('reports each closed candle with the history that includes it', async () => {
		const seen: number[] = [];
		const observer: PipelineObserver = {
			onCandleClosed: (candle, history) => {
				expect(history.at(-1)).toEqual(candle);
				seen.push(candle.bucketStart);
			},
		};
		bot.addObserver(observer);

		await bot.initialize();
		bot.start();
		[trade(0, 100), trade(0, 101), trade(1, 99), trade(2, 98)].forEach(feed.push);

		expect(seen).toEqual([0, 1]);
		expect(bot.snapshot().current).toMatchObject({ bucketStart: 2, close: 98 });
	});

	it('keeps running when an observer throws', async () => {
		bot.addObserver({
			onEvent: () => {
				throw new Error('render failed');
			},
		});

		await bot.initialize();
		bot.start();
		[trade(0, 100), trade(1, 101)].forEach(feed.push);

		expect(bot.snapshot().closedCandles).toBe(1);
	});

	it('refuses to start before a healthy initialize', () => {
		bot.start();
		expect(feed.connector.connect).not.toHaveBeenCalled();
		expect(bot.snapshot().state).toBe(BotState.INITIALIZING);
	});

	it('enters EMERGENCY when the account cannot be read', async () => {
		adapter.getPosition.mockRejectedValue(new Error('invalid key'));

		await expect(bot.initialize()).resolves.toEqual({
			success: false,
			error: 'Bot initialization failed: invalid key',
		});
		bot.start();

		expect(bot.snapshot().state).toBe(BotState.EMERGENCY);
		expect(feed.connector.connect).not.toHaveBeenCalled();
	});

	it('reads the funding rate during initialize', async () => {
		const fundingRate = vi.fn(async (_symbol: string) => 0.0001);
		adapter.getPosition.mockResolvedValue({ symbol: SYMBOL, signedQuantity: -2, leverage: 5 });
		const withFunding = new TradingBot({
			config,
			log: silentLog(),
			adapter,
			feed: feed.connector,
			fundingRate,
		});

		await expect(withFunding.initialize()).resolves.toEqual({ success: true });
		expect(fundingRate).toHaveBeenCalledWith(SYMBOL);
	});

	it('survives a failed order and keeps consuming', async () => {
		adapter.placeOrder.mockRejectedValue(new Error('exchange down'));

		await bot.initialize();
		bot.start();
		decline(42).forEach(feed.push);
		await bot.idle();

		expect(adapter.placeOrder).toHaveBeenCalledTimes(3);
		expect(bot.snapshot()).toMatchObject({ state: BotState.RUNNING, executions: 1 });
	});

	describe('when an execution outlives its queue timeout', () => {
		let netQuantity: number;
		let inFlight: number;
		let peakInFlight: number;

		beforeEach(() => {
			netQuantity = 0;
			inFlight = 0;
			peakInFlight = 0;
			adapter.getPosition.mockImplementation(async (symbol) => {
				inFlight++;
				peakInFlight = Math.max(peakInFlight, inFlight);
				await new Promise((resolve) => setTimeout(resolve, 150));
				inFlight--;
				return { symbol, signedQuantity: netQuantity, leverage: 5 };
			});
			adapter.placeOrder.mockImplementation(async (_symbol, side, size) => {
				netQuantity += side === 'buy' ? size : -size;
				return { orderId: `order-${netQuantity}`, clientOid: 'client-1' };
			});
			bot = new TradingBot({
				config: { ...config, signalBufferSeconds: 0 },
				log: silentLog(),
				adapter,
				feed: feed.connector,
				orderTimeoutMs: 50,
				retryDelayMs: 0,
			});
		});

		it('never runs two executions at once', async () => {
			await bot.initialize();
			bot.start();
			decline(42).forEach(feed.push);
			await bot.idle();

			expect(bot.snapshot().signal).toEqual({ lastSignal: 'BUY', lastSignalTime: 40 });
			expect(peakInFlight).toBe(1);
			expect(adapter.placeOrder).toHaveBeenCalledTimes(1);
			expect(netQuantity).toBe(1);
		});

		it('lets the running execution finish before closing on stop', async () => {
			adapter.closePosition.mockImplementation(async () => {
				netQuantity = 0;
				return { orderId: 'close-1', clientOid: 'client-0' };
			});

			await bot.initialize();
			bot.start();
			decline(41).forEach(feed.push);
			await vi.waitFor(() => expect(adapter.getPosition).toHaveBeenCalledTimes(2));
			await bot.stop();

			expect(adapter.placeOrder).toHaveBeenCalledTimes(1);
			const openedAt = adapter.placeOrder.mock.invocationCallOrder[0] ?? Infinity;
			const closedAt = adapter.closePosition.mock.invocationCallOrder[0] ?? -Infinity;
			expect(openedAt).toBeLessThan(closedAt);
			expect(netQuantity).toBe(0);
		});
	});

	it('reports late events in the shutdown summary', async () => {
		const log = silentLog();
		const position = vi.spyOn(log, 'position');
		const logged = new TradingBot({ config, log, adapter, feed: feed.connector });

		await logged.initialize();
		logged.start();
		[trade(5, 100), trade(6, 101), trade(4, 99)].forEach(feed.push);
		await logged.stop();

		expect(position).toHaveBeenLastCalledWith('Bot stopped', {
			closedCandles: 1,
			lateEvents: 1,
			executions: 0,
		});
	});

	it('closes the position before dropping the feed on stop', async () => {
		adapter.closePosition.mockResolvedValue({ orderId: 'close-1', clientOid: 'client-0' });

		await bot.initialize();
		bot.start();
		feed.push(trade(0, 100));
		await bot.stop();
		await bot.stop();

		expect(adapter.closePosition).toHaveBeenCalledTimes(1);
		expect(adapter.closePosition).toHaveBeenCalledWith(SYMBOL);
		expect(feed.handle.stop).toHaveBeenCalledTimes(1);
		const closedAt = adapter.closePosition.mock.invocationCallOrder[0] ?? Infinity;
		const stoppedAt = feed.handle.stop.mock.invocationCallOrder[0] ?? -Infinity;
		expect(closedAt).toBeLessThan(stoppedAt);

		feed.push(trade(1, 101));
		expect(bot.snapshot()).toMatchObject({ state: BotState.SHUTDOWN, closedCandles: 0 });
	});
});
