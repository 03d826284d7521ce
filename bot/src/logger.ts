import winston from 'winston';
import type { Candle, MarketState } from './types';

type LogData = Record<string, unknown>;

export type LogOptions = {
	level?: string;
	file?: string | null;
	silent?: boolean;
};

const format = winston.format.combine(
	winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
	winston.format.printf(
		({ timestamp, level, message, component, data, correlationId }) => {
			const prefix = component ? `[${component}]` : '';
			const correlation = correlationId ? ` (${correlationId})` : '';
			const structured = data ? ` ${JSON.stringify(data)}` : '';
			return `${timestamp} ${level.toUpperCase()} ${prefix}${correlation} ${message}${structured}`;
		}
	)
);

export function createLog(options: LogOptions = {}) {
	const transports = [
		new winston.transports.Console(),
		...(options.file ? [new winston.transports.File({ filename: options.file })] : []),
	];

	const logger = winston.createLogger({
		level: options.level ?? 'info',
		format,
		silent: options.silent ?? false,
		transports,
	});

	return {
		feed: (message: string, data?: LogData) =>
			logger.info(message, { component: 'FEED', data }),

		candle: (candle: Candle) =>
			logger.debug('Candle closed', {
				component: 'CANDLE',
				correlationId: `bucket-${candle.bucketStart}`,
				data: candle,
			}),

		signal: (message: string, data?: LogData) =>
			logger.info(message, { component: 'SIGNAL', data }),

		order: (action: string, symbol: string, message: string, data?: LogData) =>
			logger.info(message, {
				component: 'ORDER',
				correlationId: `${symbol}-${action}-${Date.now()}`,
				data,
			}),

		risk: (message: string, data?: LogData) =>
			logger.warn(message, { component: 'RISK', data }),

		position: (message: string, data?: LogData) =>
			logger.info(message, { component: 'POSITION', data }),

		market: (state: MarketState, candles: readonly Candle[]) =>
			logger.info('MARKET', {
				component: 'DISPLAY',
				data: { ...state, candles },
			}),

		debug: (component: string, message: string, data?: LogData) =>
			logger.debug(message, { component, data }),

		warn: (component: string, message: string, data?: LogData) =>
			logger.warn(message, { component, data }),

		error: (component: string, message: string, error: Error) =>
			logger.error(message, {
				component,
				data: { error: error.message, stack: error.stack },
			}),
	};
}

export type Log = ReturnType<typeof createLog>;
