import WebSocket from 'ws';
import { FEED_CONFIG } from './config';
import { MalformedEventError, TransportError, toError } from './errors';
import { feedTopics, parseFeedFrame, type FeedFrame } from './events';
import type { BulletToken } from './kucoin';
import type { Log } from './logger';
import type { MarketEvent } from './types';

export type SocketHandlers = {
	onOpen: () => void;
	onMessage: (text: string) => void;
	onClose: (code: number, reason: string) => void;
	onError: (error: Error) => void;
};

export interface FeedSocket {
	send(data: string): void;
	close(): void;
	isOpen(): boolean;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => FeedSocket;

export const openWebSocket: SocketFactory = (url, handlers) => {
	const ws = new WebSocket(url);
	ws.on('open', () => handlers.onOpen());
	ws.on('message', (data) => handlers.onMessage(data.toString()));
	ws.on('close', (code, reason) => handlers.onClose(code, reason.toString()));
	ws.on('error', (error) => handlers.onError(error));

	return {
		send: (data) => ws.send(data),
		close: () => ws.close(),
		isOpen: () => ws.readyState === WebSocket.OPEN,
	};
};

export type FeedSettings = {
	pingIntervalMs: number;
	/** Silence allowed past a ping, and the wait for the welcome frame. */
	pingTimeoutMs: number;
	reconnectMinDelayMs: number;
	reconnectMaxDelayMs: number;
	stableConnectionMs: number;
};

export type FeedDeps = {
	tokenProvider: () => Promise<BulletToken>;
	log: Log;
	openSocket?: SocketFactory;
	now?: () => number;
	settings?: Partial<FeedSettings>;
};

export interface FeedHandle {
	stop(): void;
	isConnected(): boolean;
}

export type FeedStats = {
	connectAttempts: number;
	reconnectDelayMs: number;
	malformedFrames: number;
	deliveredEvents: number;
};

const DEFAULT_SETTINGS: FeedSettings = {
	pingIntervalMs: FEED_CONFIG.PING_INTERVAL_MS,
	pingTimeoutMs: FEED_CONFIG.PING_TIMEOUT_MS,
	reconnectMinDelayMs: FEED_CONFIG.RECONNECT_MIN_DELAY_MS,
	reconnectMaxDelayMs: FEED_CONFIG.RECONNECT_MAX_DELAY_MS,
	stableConnectionMs: FEED_CONFIG.STABLE_CONNECTION_MS,
};

/**
 * One logical subscription. Every connection attempt bumps `generation`;
 * callbacks from a superseded socket compare it and go quiet.
 */
export class FeedSession implements FeedHandle {
	private readonly cancellation = new AbortController();
	private readonly settings: FeedSettings;
	private readonly openSocket: SocketFactory;
	private readonly now: () => number;
	private readonly log: Log;

	private socket: FeedSocket | null = null;
	private heartbeat: NodeJS.Timeout | null = null;
	private welcomeTimer: NodeJS.Timeout | null = null;
	private reconnectTimer: NodeJS.Timeout | null = null;
	private generation = 0;
	private openedAt: number | null = null;
	private lastFrameAt = 0;
	private pingIntervalMs: number;
	private pingTimeoutMs: number;
	private reconnectDelayMs: number;
	private malformedFrames = 0;
	private deliveredEvents = 0;

	constructor(
		private readonly symbol: string,
		private readonly onEvent: (event: MarketEvent) => void,
		private readonly deps: FeedDeps
	) {
		this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
		this.openSocket = deps.openSocket ?? openWebSocket;
		this.now = deps.now ?? Date.now;
		this.log = deps.log;
		this.pingIntervalMs = this.settings.pingIntervalMs;
		this.pingTimeoutMs = this.settings.pingTimeoutMs;
		this.reconnectDelayMs = this.settings.reconnectMinDelayMs;
	}

	start(): void {
		this.connect().catch((error) =>
			this.log.error('FEED', 'Feed connect crashed', toError(error))
		);
	}

	stop(): void {
		if (this.cancelled) return;
		this.cancellation.abort();

		this.stopHeartbeat();
		this.clearWelcomeTimer();
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		const socket = this.socket;
		this.socket = null;
		socket?.close();

		this.log.feed('Market feed stopped', { symbol: this.symbol, ...this.stats() });
	}

	isConnected(): boolean {
		return this.socket?.isOpen() ?? false;
	}

	stats(): FeedStats {
		return {
			connectAttempts: this.generation,
			reconnectDelayMs: this.reconnectDelayMs,
			malformedFrames: this.malformedFrames,
			deliveredEvents: this.deliveredEvents,
		};
	}

	private get cancelled(): boolean {
		return this.cancellation.signal.aborted;
	}

	private isCurrent(generation: number): boolean {
		return !this.cancelled && generation === this.generation;
	}

	private async connect(): Promise<void> {
		if (this.cancelled) return;
		const generation = ++this.generation;

		let token: BulletToken;
		try {
			token = await this.deps.tokenProvider();
		} catch (error) {
			this.log.error('FEED', 'Feed token fetch failed', toError(error));
			this.scheduleReconnect();
			return;
		}
		if (!this.isCurrent(generation)) return;

		this.pingIntervalMs = token.pingIntervalMs ?? this.settings.pingIntervalMs;
		this.pingTimeoutMs = token.pingTimeoutMs ?? this.settings.pingTimeoutMs;
		const url = `${token.endpoint}?token=${encodeURIComponent(token.token)}&connectId=${this.now()}`;
		this.log.feed('Connecting to market feed', {
			endpoint: token.endpoint,
			attempt: generation,
		});

		try {
			this.socket = this.openSocket(url, {
				onOpen: () => {
					if (!this.isCurrent(generation)) return;
					this.openedAt = this.now();
					this.log.feed('Socket open, waiting for welcome');
				},
				onMessage: (text) => {
					if (this.isCurrent(generation)) this.handleFrame(text);
				},
				onClose: (code, reason) => {
					// A stalled socket was already retired; its late close is not news.
					if (this.isCurrent(generation) && this.socket) {
						this.handleClose(code, reason);
					}
				},
				onError: (error) => {
					if (!this.isCurrent(generation)) return;
					this.log.error(
						'FEED',
						'Socket error',
						new TransportError(error.message, { cause: error })
					);
				},
			});
		} catch (error) {
			this.log.error('FEED', 'Socket open failed', toError(error));
			this.socket = null;
			this.scheduleReconnect();
			return;
		}

		this.lastFrameAt = this.now();
		this.welcomeTimer = setTimeout(() => {
			this.welcomeTimer = null;
			this.handleStall('no welcome frame');
		}, this.pingTimeoutMs);
	}

	private handleFrame(text: string): void {
		this.lastFrameAt = this.now();
		let frame: FeedFrame;
		try {
			frame = parseFeedFrame(text);
		} catch (error) {
			if (!(error instanceof MalformedEventError)) throw error;
			this.malformedFrames++;
			this.log.debug('FEED', 'Dropped malformed frame', { reason: error.message });
			return;
		}

		switch (frame.type) {
			case 'welcome':
				this.clearWelcomeTimer();
				this.subscribe();
				this.startHeartbeat();
				break;
			case 'pong':
				break;
			case 'ack':
				this.log.debug('FEED', 'Subscription acknowledged', { id: frame.id });
				break;
			case 'error':
				this.log.warn('FEED', 'Server error frame', {
					code: frame.code,
					message: frame.message,
				});
				break;
			case 'event':
				this.deliver(frame.event);
				break;
		}
	}

	private deliver(event: MarketEvent): void {
		this.deliveredEvents++;
		try {
			this.onEvent(event);
		} catch (error) {
			this.log.error('FEED', 'Event consumer failed', toError(error));
		}
	}

	private handleClose(code: number, reason: string): void {
		this.stopHeartbeat();
		this.clearWelcomeTimer();
		const uptimeMs = this.openedAt === null ? 0 : this.now() - this.openedAt;
		if (uptimeMs >= this.settings.stableConnectionMs) {
			this.reconnectDelayMs = this.settings.reconnectMinDelayMs;
		}
		this.openedAt = null;
		this.socket = null;

		this.log.warn('FEED', 'Market feed disconnected', { code, reason, uptimeMs });
		this.scheduleReconnect();
	}

	/** Retires a socket that went quiet without closing, then reconnects. */
	private handleStall(reason: string): void {
		const socket = this.socket;
		this.handleClose(4000, reason);
		socket?.close();
	}

	private scheduleReconnect(): void {
		if (this.cancelled || this.reconnectTimer) return;

		const delay = this.reconnectDelayMs;
		this.reconnectDelayMs = Math.min(delay * 2, this.settings.reconnectMaxDelayMs);
		this.log.feed(`Reconnecting in ${delay}ms`, { symbol: this.symbol });

		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.start();
		}, delay);
	}

	private subscribe(): void {
		const topics = feedTopics(this.symbol);
		topics.forEach((topic, i) => {
			this.send({
				id: String(this.now() + i),
				type: 'subscribe',
				topic,
				privateChannel: false,
				response: true,
			});
		});
		this.log.feed('Subscribed to market topics', { topics });
	}

	private startHeartbeat(): void {
		this.stopHeartbeat();
		this.heartbeat = setInterval(() => {
			const silentMs = this.now() - this.lastFrameAt;
			if (silentMs >= this.pingIntervalMs + this.pingTimeoutMs) {
				this.handleStall(`no frames for ${silentMs}ms`);
				return;
			}
			this.send({ id: String(this.now()), type: 'ping' });
		}, this.pingIntervalMs);
	}

	private clearWelcomeTimer(): void {
		if (this.welcomeTimer) {
			clearTimeout(this.welcomeTimer);
			this.welcomeTimer = null;
		}
	}

	private stopHeartbeat(): void {
		if (this.heartbeat) {
			clearInterval(this.heartbeat);
			this.heartbeat = null;
		}
	}

	private send(message: Record<string, unknown>): void {
		try {
			this.socket?.send(JSON.stringify(message));
		} catch (error) {
			this.log.error('FEED', 'Socket send failed', toError(error));
		}
	}
}

export class FeedConnectionManager {
	constructor(private readonly deps: FeedDeps) {}

	connect(symbol: string, onEvent: (event: MarketEvent) => void): FeedSession {
		const session = new FeedSession(symbol, onEvent, this.deps);
		session.start();
		return session;
	}
}
