import { RISK_CONFIG } from './config';
import { OrderExecutionError, toError } from './errors';
import { isMissingPositionError } from './kucoin';
import type { Log } from './logger';
import type {
	ExecutionAdapter,
	ExecutionResult,
	OrderResult,
	Signal,
	TradeSide,
} from './types';

export type ExecutorSettings = {
	symbol: string;
	leverage: number;
	positionSize: number;
	maxRetries?: number;
	retryDelayMs?: number;
};

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Flip-or-open position policy. Never adds to a position that already points
 * the signal's way.
 */
export class TradeExecutor {
	private readonly maxRetries: number;
	private readonly retryDelayMs: number;

	constructor(
		private readonly adapter: ExecutionAdapter,
		private readonly settings: ExecutorSettings,
		private readonly log: Log
	) {
		this.maxRetries = settings.maxRetries ?? RISK_CONFIG.MAX_RETRIES;
		this.retryDelayMs = settings.retryDelayMs ?? RISK_CONFIG.RETRY_DELAY_MS;
	}

	async execute(signal: Signal): Promise<ExecutionResult> {
		if (signal === 'HOLD') return { success: true, action: 'SKIPPED' };

		const { symbol, leverage, positionSize } = this.settings;
		const side: TradeSide = signal === 'BUY' ? 'buy' : 'sell';

		try {
			const position = await this.adapter.getPosition(symbol);
			const currentSize = position?.signedQuantity ?? 0;
			this.log.position('Current position', { symbol, currentSize });

			const aligned = signal === 'BUY' ? currentSize > 0 : currentSize < 0;
			if (aligned) {
				this.log.position(`Already positioned for ${signal}, skipping`, {
					currentSize,
				});
				return { success: true, action: 'SKIPPED' };
			}

			await this.adapter.setLeverage(symbol, leverage);
			this.log.position(`Leverage set to ${leverage}x`, { symbol });

			const flipping = currentSize !== 0;
			if (flipping) {
				this.log.position(
					`Closing existing ${currentSize > 0 ? 'long' : 'short'} position`,
					{ currentSize }
				);
				await this.adapter.closePosition(symbol);
			}

			const order = await this.placeWithRetry(side);
			this.log.order(
				'OPEN',
				symbol,
				`${side === 'buy' ? 'Long' : 'Short'} position opened`,
				{ ...order, size: positionSize, leverage }
			);

			return { success: true, action: flipping ? 'FLIPPED' : 'OPENED' };
		} catch (error) {
			const failure = new OrderExecutionError(
				`${signal} execution failed: ${toError(error).message}`,
				{ cause: error }
			);
			this.log.error('ORDER', failure.message, failure);
			return { success: false, action: 'FAILED', error: failure.message };
		}
	}

	/** Best-effort close; a missing position is not an error. */
	async closeAll(): Promise<ExecutionResult> {
		const { symbol } = this.settings;
		try {
			const order = await this.adapter.closePosition(symbol);
			if (!order) {
				this.log.position('No position to close', { symbol });
				return { success: true, action: 'SKIPPED' };
			}
			this.log.order('CLOSE', symbol, 'Position closed', { ...order });
			return { success: true, action: 'CLOSED' };
		} catch (error) {
			if (isMissingPositionError(error)) {
				this.log.position('No position to close', { symbol });
				return { success: true, action: 'SKIPPED' };
			}
			const failure = new OrderExecutionError(
				`Close failed: ${toError(error).message}`,
				{ cause: error }
			);
			this.log.error('ORDER', failure.message, failure);
			return { success: false, action: 'FAILED', error: failure.message };
		}
	}

	private async placeWithRetry(side: TradeSide): Promise<OrderResult> {
		const { symbol, leverage, positionSize } = this.settings;

		for (let attempt = 1; ; attempt++) {
			try {
				return await this.adapter.placeOrder(symbol, side, positionSize, leverage);
			} catch (error) {
				if (attempt >= this.maxRetries) {
					throw new OrderExecutionError(
						`Open order failed after ${attempt} attempts: ${toError(error).message}`,
						{ cause: error }
					);
				}

				const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
				this.log.error(
					'ORDER',
					`Open attempt ${attempt} failed, retrying in ${delay}ms`,
					toError(error)
				);
				await sleep(delay);
			}
		}
	}
}
