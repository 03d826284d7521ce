export class BotError extends Error {
	constructor(
		readonly component: string,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Socket, connect or DNS failure. Retried with backoff. */
export class TransportError extends BotError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('FEED', message, options);
	}
}

/** The exchange refused to issue a feed token. */
export class AuthError extends BotError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('FEED', message, options);
	}
}

export class MalformedEventError extends BotError {
	constructor(
		message: string,
		readonly frame: string
	) {
		super('EVENTS', message);
	}
}

export class ExchangeApiError extends BotError {
	constructor(
		readonly code: string,
		message: string,
		readonly status?: number
	) {
		super('EXCHANGE', `${message} (code ${code})`);
	}
}

export class OrderExecutionError extends BotError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('ORDER', message, options);
	}
}

export class ConfigError extends BotError {
	constructor(message: string) {
		super('CONFIG', message);
	}
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
