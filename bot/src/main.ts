import 'dotenv/config';
import { TradingBot } from './bot';
import { loadConfig, type BotConfig } from './config';
import { MarketDisplay } from './display';
import { ConfigError, toError } from './errors';
import { FeedConnectionManager } from './feed';
import { KuCoinFuturesClient } from './kucoin';
import { createLog, type Log } from './logger';

let bot: TradingBot | null = null;
let log: Log = createLog();
let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
	if (isShuttingDown) return;

	isShuttingDown = true;
	log.position('Shutdown initiated', { signal });

	try {
		if (bot) {
			await bot.stop();
		}
		log.position('Shutdown completed');
		process.exit(0);
	} catch (error) {
		log.error('SHUTDOWN', 'Shutdown failed', toError(error));
		process.exit(1);
	}
}

function readConfig(): BotConfig {
	try {
		return loadConfig();
	} catch (error) {
		if (error instanceof ConfigError) {
			log.error('CONFIG', error.message, error);
			process.exit(1);
		}
		throw error;
	}
}

async function main(): Promise<void> {
	const config = readConfig();
	log = createLog({ level: config.logLevel, file: config.logFile });

	log.position('Trading bot starting', {
		symbol: config.symbol,
		sandbox: config.useSandbox,
	});
	if (!config.useSandbox) {
		log.risk('LIVE mode: orders use real funds', {
			leverage: config.leverage,
			positionSize: config.positionSize,
		});
	}

	process.on('SIGINT', () => void shutdown('SIGINT'));
	process.on('SIGTERM', () => void shutdown('SIGTERM'));
	process.on('uncaughtException', (error) => {
		log.error('FATAL', 'Uncaught exception', error);
		void shutdown('UNCAUGHT_EXCEPTION');
	});
	process.on('unhandledRejection', (reason) => {
		log.error('FATAL', 'Unhandled rejection', toError(reason));
		void shutdown('UNHANDLED_REJECTION');
	});

	const client = new KuCoinFuturesClient({
		credentials: {
			apiKey: config.apiKey,
			apiSecret: config.apiSecret,
			apiPassphrase: config.apiPassphrase,
		},
		useSandbox: config.useSandbox,
	});

	const feed = new FeedConnectionManager({
		tokenProvider: () => client.getPublicToken(),
		log,
	});

	bot = new TradingBot({
		config,
		log,
		adapter: client,
		feed,
		fundingRate: (symbol) => client.getFundingRate(symbol),
	});
	bot.addObserver(new MarketDisplay(bot.aggregator, log));

	const initResult = await bot.initialize();
	if (!initResult.success) {
		log.error('MAIN', 'Bot initialization failed', new Error(initResult.error));
		process.exit(1);
	}

	bot.start();
	log.position('Trading bot running');
}

main().catch((error) => {
	log.error('MAIN', 'Unhandled main error', toError(error));
	process.exit(1);
});
