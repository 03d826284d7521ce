import { ConfigError } from './errors';

export type BotConfig = {
	apiKey: string;
	apiSecret: string;
	apiPassphrase: string;
	useSandbox: boolean;
	symbol: string;
	leverage: number;
	positionSize: number;
	rsiLower: number;
	rsiUpper: number;
	signalBufferSeconds: number;
	maxHistory: number;
	logLevel: string;
	logFile: string | null;
};

export const EXCHANGE_CONFIG = {
	API_URL: 'https://api-futures.kucoin.com',
	SANDBOX_API_URL: 'https://api-sandbox-futures.kucoin.com',
	SUCCESS_CODE: '200000',
	REQUEST_TIMEOUT_MS: 5000,
	MIN_REQUEST_INTERVAL_MS: 100,
};

export const FEED_CONFIG = {
	PING_INTERVAL_MS: 20_000,
	PING_TIMEOUT_MS: 10_000,
	RECONNECT_MIN_DELAY_MS: 5_000,
	RECONNECT_MAX_DELAY_MS: 60_000,
	STABLE_CONNECTION_MS: 30_000,
};

export const INDICATOR_CONFIG = {
	RSI_PERIOD: 14,
	MACD_FAST: 12,
	MACD_SLOW: 26,
	MACD_SIGNAL: 9,
};

export const RISK_CONFIG = {
	MAX_RETRIES: 3,
	RETRY_DELAY_MS: 1000,
	ORDER_TIMEOUT_MS: 15_000,
};

export const DISPLAY_CONFIG = {
	CANDLES_SHOWN: 5,
	INTERVAL_MS: 1000,
};

const DEFAULTS = {
	SYMBOL: 'SOLUSDTM',
	LEVERAGE: 5,
	POSITION_SIZE: 1,
	RSI_LOWER: 40,
	RSI_UPPER: 60,
	SIGNAL_BUFFER_SECONDS: 3,
	MAX_HISTORY: 100,
	LOG_LEVEL: 'info',
	LOG_FILE: 'bot.log',
};

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
	const value = env[key]?.trim();
	if (!value) {
		throw new ConfigError(`Missing ${key} in environment`);
	}
	return value;
}

function numeric(
	env: Env,
	key: string,
	fallback: number,
	check: { integer?: boolean; min?: number; max?: number } = {}
): number {
	const raw = env[key]?.trim();
	if (!raw) return fallback;

	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigError(`${key} must be a number, got "${raw}"`);
	}
	if (check.integer && !Number.isInteger(value)) {
		throw new ConfigError(`${key} must be an integer, got "${raw}"`);
	}
	if (check.min !== undefined && value < check.min) {
		throw new ConfigError(`${key} must be >= ${check.min}, got ${value}`);
	}
	if (check.max !== undefined && value > check.max) {
		throw new ConfigError(`${key} must be <= ${check.max}, got ${value}`);
	}
	return value;
}

function flag(env: Env, key: string): boolean {
	const raw = env[key]?.trim().toLowerCase();
	return raw === 'true' || raw === '1' || raw === 'yes';
}

export function loadConfig(env: Env = process.env): BotConfig {
	const config: BotConfig = {
		apiKey: required(env, 'KUCOIN_API_KEY'),
		apiSecret: required(env, 'KUCOIN_API_SECRET'),
		apiPassphrase: required(env, 'KUCOIN_API_PASSPHRASE'),
		useSandbox: flag(env, 'USE_SANDBOX'),
		symbol: env.SYMBOL?.trim() || DEFAULTS.SYMBOL,
		leverage: numeric(env, 'LEVERAGE', DEFAULTS.LEVERAGE, {
			integer: true,
			min: 1,
			max: 100,
		}),
		positionSize: numeric(env, 'POSITION_SIZE', DEFAULTS.POSITION_SIZE, {
			min: Number.MIN_VALUE,
		}),
		rsiLower: numeric(env, 'RSI_LOWER', DEFAULTS.RSI_LOWER, { min: 0, max: 100 }),
		rsiUpper: numeric(env, 'RSI_UPPER', DEFAULTS.RSI_UPPER, { min: 0, max: 100 }),
		signalBufferSeconds: numeric(
			env,
			'SIGNAL_BUFFER_SECONDS',
			DEFAULTS.SIGNAL_BUFFER_SECONDS,
			{ integer: true, min: 0 }
		),
		maxHistory: numeric(env, 'MAX_HISTORY', DEFAULTS.MAX_HISTORY, {
			integer: true,
			min: INDICATOR_CONFIG.MACD_SLOW + INDICATOR_CONFIG.MACD_SIGNAL + 1,
		}),
		logLevel: env.LOG_LEVEL?.trim() || DEFAULTS.LOG_LEVEL,
		logFile: env.LOG_FILE === '' ? null : env.LOG_FILE?.trim() || DEFAULTS.LOG_FILE,
	};

	if (config.rsiLower >= config.rsiUpper) {
		throw new ConfigError(
			`RSI_LOWER (${config.rsiLower}) must be below RSI_UPPER (${config.rsiUpper})`
		);
	}

	return config;
}
