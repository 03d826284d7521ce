import Bottleneck from 'bottleneck';
import { CandleAggregator } from './candles';
import { RISK_CONFIG, type BotConfig } from './config';
import { toError } from './errors';
import { TradeExecutor } from './execution';
import type { FeedHandle } from './feed';
import type { Log } from './logger';
import { SignalGenerator } from './signal';
import type {
	Candle,
	ExecutionAdapter,
	ExecutionResult,
	MarketEvent,
	PipelineObserver,
	Signal,
	SignalState,
} from './types';

export enum BotState {
	INITIALIZING = 'INITIALIZING',
	HEALTHY = 'HEALTHY',
	RUNNING = 'RUNNING',
	EMERGENCY = 'EMERGENCY',
	SHUTDOWN = 'SHUTDOWN',
}

export type TradingConfig = Pick<
	BotConfig,
	| 'symbol'
	| 'leverage'
	| 'positionSize'
	| 'rsiLower'
	| 'rsiUpper'
	| 'signalBufferSeconds'
	| 'maxHistory'
>;

export interface FeedConnector {
	connect(symbol: string, onEvent: (event: MarketEvent) => void): FeedHandle;
}

export type TradingBotDeps = {
	config: TradingConfig;
	log: Log;
	adapter: ExecutionAdapter;
	feed: FeedConnector;
	observers?: PipelineObserver[];
	fundingRate?: (symbol: string) => Promise<number | null>;
	orderTimeoutMs?: number;
	retryDelayMs?: number;
};

export type BotSnapshot = {
	state: BotState;
	closedCandles: number;
	current: Candle | null;
	signal: SignalState;
	executions: number;
};

/**
 * Single owner of the candle history and signal state. Feed events are
 * processed synchronously; orders run on a one-slot queue off the feed path.
 */
export class TradingBot {
	private state: BotState = BotState.INITIALIZING;
	private feedHandle: FeedHandle | null = null;
	private executions = 0;
	private activeExecutions = 0;
	// Expired queue jobs keep running; every execution chains behind the last one.
	private executionChain: Promise<unknown> = Promise.resolve();

	readonly aggregator: CandleAggregator;
	private readonly generator: SignalGenerator;
	private readonly executor: TradeExecutor;
	private readonly orderQueue: Bottleneck;
	private readonly observers: PipelineObserver[];
	private readonly orderTimeoutMs: number;
	private readonly log: Log;

	constructor(private readonly deps: TradingBotDeps) {
		const { config } = deps;
		this.log = deps.log;
		this.aggregator = new CandleAggregator(config.maxHistory);
		this.generator = new SignalGenerator({
			rsiLower: config.rsiLower,
			rsiUpper: config.rsiUpper,
			signalBufferSeconds: config.signalBufferSeconds,
			minHistory: config.maxHistory,
		});
		this.executor = new TradeExecutor(
			deps.adapter,
			{
				symbol: config.symbol,
				leverage: config.leverage,
				positionSize: config.positionSize,
				retryDelayMs: deps.retryDelayMs,
			},
			deps.log
		);
		// A newer signal replaces one still waiting behind a running order.
		this.orderQueue = new Bottleneck({
			maxConcurrent: 1,
			highWater: 1,
			strategy: Bottleneck.strategy.LEAK,
		});
		this.observers = deps.observers ?? [];
		this.orderTimeoutMs = deps.orderTimeoutMs ?? RISK_CONFIG.ORDER_TIMEOUT_MS;
	}

	addObserver(observer: PipelineObserver): void {
		this.observers.push(observer);
	}

	async initialize(): Promise<{ success: boolean; error?: string }> {
		const { config } = this.deps;
		try {
			this.log.position('Bot initialization started', {
				symbol: config.symbol,
				leverage: config.leverage,
				positionSize: config.positionSize,
				rsiBand: [config.rsiLower, config.rsiUpper],
				signalBufferSeconds: config.signalBufferSeconds,
				maxHistory: config.maxHistory,
			});

			const position = await this.deps.adapter.getPosition(config.symbol);
			const size = position?.signedQuantity ?? 0;
			if (size !== 0) {
				this.log.position('Reconstructed position', {
					side: size > 0 ? 'LONG' : 'SHORT',
					size,
					leverage: position?.leverage,
				});
			} else {
				this.log.position('No existing position found');
			}

			if (this.deps.fundingRate) {
				const rate = await this.deps.fundingRate(config.symbol);
				this.log.position('Current funding rate', { fundingRate: rate });
			}

			this.state = BotState.HEALTHY;
			return { success: true };
		} catch (error) {
			this.state = BotState.EMERGENCY;
			return {
				success: false,
				error: `Bot initialization failed: ${toError(error).message}`,
			};
		}
	}

	start(): void {
		if (this.state !== BotState.HEALTHY) {
			this.log.error(
				'BOT',
				'Cannot start bot in non-healthy state',
				new Error(`Current state: ${this.state}`)
			);
			return;
		}

		this.state = BotState.RUNNING;
		this.feedHandle = this.deps.feed.connect(this.deps.config.symbol, (event) =>
			this.handleEvent(event)
		);
		this.log.feed('Waiting for market data', { symbol: this.deps.config.symbol });
	}

	async stop(): Promise<void> {
		if (this.state === BotState.SHUTDOWN) return;
		this.state = BotState.SHUTDOWN;
		this.log.position('Stopping bot');

		await this.orderQueue.stop({ dropWaitingJobs: true });
		await this.idle();
		await this.executor.closeAll();

		this.feedHandle?.stop();
		this.feedHandle = null;

		this.log.position('Bot stopped', {
			closedCandles: this.aggregator.size(),
			lateEvents: this.aggregator.lateEventCount(),
			executions: this.executions,
		});
	}

	snapshot(): BotSnapshot {
		return {
			state: this.state,
			closedCandles: this.aggregator.size(),
			current: this.aggregator.current(),
			signal: this.generator.state(),
			executions: this.executions,
		};
	}

	/** Returns once every queued order job and every execution it started has finished. */
	async idle(): Promise<void> {
		while (this.pendingOrders() > 0 || this.activeExecutions > 0) {
			await new Promise((resolve) => setTimeout(resolve, 10));
		}
	}

	private pendingOrders(): number {
		const counts = this.orderQueue.counts();
		return counts.RECEIVED + counts.QUEUED + counts.RUNNING + counts.EXECUTING;
	}

	private handleEvent(event: MarketEvent): void {
		if (this.state !== BotState.RUNNING) return;

		const closed = this.aggregator.ingest(event);
		this.notify((observer) => observer.onEvent?.(event));
		if (!closed) return;

		this.log.candle(closed);
		const history = this.aggregator.history();
		this.notify((observer) => observer.onCandleClosed?.(closed, history));

		const evaluation = this.generator.evaluate(
			this.aggregator.closes(),
			closed.bucketStart
		);
		if (!evaluation) return;
		this.notify((observer) => observer.onSignal?.(evaluation));

		if (evaluation.suppressed) {
			this.log.debug('SIGNAL', `${evaluation.signal} suppressed by cooldown`, {
				time: evaluation.time,
			});
			return;
		}
		if (!evaluation.emitted) return;

		this.log.signal(`${evaluation.signal} signal`, {
			time: evaluation.time,
			rsi: Number(evaluation.rsi.toFixed(2)),
			histogram: evaluation.macd.histogram,
			previousHistogram: evaluation.previousHistogram,
		});
		this.dispatch(evaluation.signal);
	}

	private dispatch(signal: Signal): void {
		this.orderQueue
			.schedule({ expiration: this.orderTimeoutMs }, () => {
				this.executions++;
				return this.serialize(signal);
			})
			.then((result) => {
				if (!result.success) {
					this.log.risk(`${signal} not executed`, { error: result.error });
				}
			})
			.catch((error) =>
				this.log.error('ORDER', `${signal} order job dropped`, toError(error))
			);
	}

	private serialize(signal: Signal): Promise<ExecutionResult> {
		this.activeExecutions++;
		const run = this.executionChain
			.then(() => this.executor.execute(signal))
			.finally(() => {
				this.activeExecutions--;
			});
		this.executionChain = run.catch((error) =>
			this.log.error('ORDER', `${signal} execution crashed`, toError(error))
		);
		return run;
	}

	private notify(fn: (observer: PipelineObserver) => void): void {
		for (const observer of this.observers) {
			try {
				fn(observer);
			} catch (error) {
				this.log.error('OBSERVER', 'Observer failed', toError(error));
			}
		}
	}
}
