import Bottleneck from 'bottleneck';
import { createHmac } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import { EXCHANGE_CONFIG } from './config';
import { AuthError, ExchangeApiError, TransportError, toError } from './errors';
import type { ExecutionAdapter, OrderResult, Position, TradeSide } from './types';

export type KuCoinCredentials = {
	apiKey: string;
	apiSecret: string;
	apiPassphrase: string;
};

export type KuCoinClientOptions = {
	credentials: KuCoinCredentials;
	useSandbox?: boolean;
	fetch?: typeof fetch;
	now?: () => number;
	limiter?: Bottleneck;
	timeoutMs?: number;
};

export type BulletToken = {
	token: string;
	endpoint: string;
	pingIntervalMs: number | null;
	pingTimeoutMs: number | null;
};

type RequestOptions = {
	query?: Record<string, string>;
	body?: Record<string, unknown>;
	signed?: boolean;
};

type Json = Record<string, unknown>;

const isObject = (value: unknown): value is Json =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const POSITION_MISSING = /position.*(not exist|does not exist|not found)/i;

export function isMissingPositionError(error: unknown): boolean {
	return error instanceof ExchangeApiError && POSITION_MISSING.test(error.message);
}

/**
 * KuCoin Futures REST client: public feed token plus the signed trade calls the bot needs.
 */
export class KuCoinFuturesClient implements ExecutionAdapter {
	readonly baseUrl: string;
	private readonly credentials: KuCoinCredentials;
	private readonly fetchFn: typeof fetch;
	private readonly now: () => number;
	private readonly limiter: Bottleneck;
	private readonly timeoutMs: number;

	constructor(options: KuCoinClientOptions) {
		this.credentials = options.credentials;
		this.baseUrl = options.useSandbox
			? EXCHANGE_CONFIG.SANDBOX_API_URL
			: EXCHANGE_CONFIG.API_URL;
		this.fetchFn = options.fetch ?? fetch;
		this.now = options.now ?? Date.now;
		this.limiter =
			options.limiter ??
			new Bottleneck({
				maxConcurrent: 1,
				minTime: EXCHANGE_CONFIG.MIN_REQUEST_INTERVAL_MS,
			});
		this.timeoutMs = options.timeoutMs ?? EXCHANGE_CONFIG.REQUEST_TIMEOUT_MS;
	}

	async getPublicToken(): Promise<BulletToken> {
		let data: unknown;
		try {
			data = await this.request('POST', '/api/v1/bullet-public');
		} catch (error) {
			if (error instanceof ExchangeApiError) {
				throw new AuthError(`Feed token rejected: ${error.message}`, { cause: error });
			}
			throw error;
		}

		const server: unknown =
			isObject(data) && Array.isArray(data.instanceServers)
				? data.instanceServers[0]
				: undefined;
		if (!isObject(data) || typeof data.token !== 'string' || !isObject(server)) {
			throw new AuthError('Feed token response has no token or instance server');
		}
		if (typeof server.endpoint !== 'string') {
			throw new AuthError('Feed instance server has no endpoint');
		}

		return {
			token: data.token,
			endpoint: server.endpoint,
			pingIntervalMs:
				typeof server.pingInterval === 'number' ? server.pingInterval : null,
			pingTimeoutMs: typeof server.pingTimeout === 'number' ? server.pingTimeout : null,
		};
	}

	async getPosition(symbol: string): Promise<Position | null> {
		const data = await this.request('GET', '/api/v1/position', {
			query: { symbol },
			signed: true,
		});
		if (!isObject(data)) return null;

		const quantity = Number(data.currentQty ?? 0);
		return {
			symbol,
			signedQuantity: Number.isFinite(quantity) ? quantity : 0,
			leverage: Number(data.realLeverage ?? 0) || 0,
		};
	}

	async setLeverage(symbol: string, leverage: number): Promise<void> {
		await this.request('POST', '/api/v2/changeCrossUserLeverage', {
			body: { symbol, leverage: String(leverage) },
			signed: true,
		});
	}

	async placeOrder(
		symbol: string,
		side: TradeSide,
		size: number,
		leverage: number
	): Promise<OrderResult> {
		const clientOid = uuidv4();
		const data = await this.request('POST', '/api/v1/orders', {
			body: {
				clientOid,
				side,
				symbol,
				type: 'market',
				leverage: String(leverage),
				size,
			},
			signed: true,
		});
		return { orderId: this.orderIdOf(data), clientOid };
	}

	/** Market close of the whole position; null when nothing is open. */
	async closePosition(symbol: string): Promise<OrderResult | null> {
		const position = await this.getPosition(symbol);
		if (!position || position.signedQuantity === 0) return null;

		const clientOid = uuidv4();
		const data = await this.request('POST', '/api/v1/orders', {
			body: { clientOid, symbol, type: 'market', closeOrder: true },
			signed: true,
		});
		return { orderId: this.orderIdOf(data), clientOid };
	}

	async getFundingRate(symbol: string): Promise<number | null> {
		const data = await this.request(
			'GET',
			`/api/v1/funding-rate/${encodeURIComponent(symbol)}/current`
		);
		if (!isObject(data)) return null;
		const rate = Number(data.value);
		return Number.isFinite(rate) ? rate : null;
	}

	sign(timestamp: string, method: string, endpoint: string, body: string) {
		const { apiSecret, apiPassphrase } = this.credentials;
		const signature = createHmac('sha256', apiSecret)
			.update(timestamp + method + endpoint + body)
			.digest('base64');
		const passphrase = createHmac('sha256', apiSecret)
			.update(apiPassphrase)
			.digest('base64');
		return { signature, passphrase };
	}

	private orderIdOf(data: unknown): string {
		if (isObject(data) && typeof data.orderId === 'string') return data.orderId;
		throw new ExchangeApiError('NO_ORDER_ID', 'Order response has no orderId');
	}

	private request(
		method: 'GET' | 'POST',
		path: string,
		options: RequestOptions = {}
	): Promise<unknown> {
		return this.limiter.schedule(() => this.send(method, path, options));
	}

	private async send(
		method: 'GET' | 'POST',
		path: string,
		options: RequestOptions
	): Promise<unknown> {
		const query = options.query
			? `?${new URLSearchParams(options.query).toString()}`
			: '';
		const endpoint = `${path}${query}`;
		const body = options.body ? JSON.stringify(options.body) : '';
		const headers: Record<string, string> = { 'Content-Type': 'application/json' };

		if (options.signed) {
			const timestamp = String(this.now());
			const { signature, passphrase } = this.sign(timestamp, method, endpoint, body);
			headers['KC-API-KEY'] = this.credentials.apiKey;
			headers['KC-API-SIGN'] = signature;
			headers['KC-API-TIMESTAMP'] = timestamp;
			headers['KC-API-PASSPHRASE'] = passphrase;
			headers['KC-API-KEY-VERSION'] = '2';
		}

		let response: Response;
		try {
			response = await this.fetchFn(`${this.baseUrl}${endpoint}`, {
				method,
				headers,
				body: body || undefined,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (error) {
			throw new TransportError(`${method} ${path} failed: ${toError(error).message}`, {
				cause: error,
			});
		}

		let payload: unknown;
		try {
			payload = await response.json();
		} catch {
			throw new ExchangeApiError(
				`HTTP_${response.status}`,
				`${method} ${path} returned a non-JSON body`,
				response.status
			);
		}

		if (!isObject(payload) || payload.code !== EXCHANGE_CONFIG.SUCCESS_CODE) {
			const code = isObject(payload) ? String(payload.code) : `HTTP_${response.status}`;
			const message =
				isObject(payload) && typeof payload.msg === 'string'
					? payload.msg
					: `${method} ${path} failed`;
			throw new ExchangeApiError(code, message, response.status);
		}

		return payload.data;
	}
}
