import { MalformedEventError } from './errors';
import type { MarketEvent, TradeSide } from './types';

export const feedTopics = (symbol: string): string[] => [
	`/contractMarket/execution:${symbol}`,
	`/contractMarket/tickerV2:${symbol}`,
	`/contract/instrument:${symbol}`,
];

export type FeedFrame =
	| { type: 'welcome'; id: string }
	| { type: 'pong' }
	| { type: 'ack'; id: string }
	| { type: 'error'; code: string; message: string }
	| { type: 'event'; event: MarketEvent };

type Json = Record<string, unknown>;

const NS_PER_MS = 1_000_000;
const NS_PER_SECOND = 1_000_000_000;
// Largest sub-second part that cannot round up into the next second at 1e18 magnitudes.
const MAX_SUBSECOND_NS = 999_999_000;
const RAW_TS = /"ts"\s*:\s*"?(\d+)"?/;

/**
 * Nanosecond stamps are past 2^53, so `JSON.parse` rounds them to 256 ns steps,
 * which can carry an event into the next second. Split the raw digits instead.
 */
function nanosFromDigits(digits: string): number {
	if (digits.length <= 15) return Number(digits);
	const seconds = Number(digits.slice(0, -9));
	const subsecond = Math.min(Number(digits.slice(-9)), MAX_SUBSECOND_NS);
	return seconds * NS_PER_SECOND + subsecond;
}

function readTimestamp(data: Json, rawTs: string | null, frame: string): number {
	const parsed = readNumber(data, 'ts', frame);
	return rawTs === null ? parsed : nanosFromDigits(rawTs);
}

function isObject(value: unknown): value is Json {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// The exchange sends prices as strings and sizes as numbers, inconsistently across channels.
function readNumber(data: Json, key: string, frame: string): number {
	const value = data[key];
	const parsed =
		typeof value === 'number'
			? value
			: typeof value === 'string' && value.trim() !== ''
				? Number(value)
				: NaN;
	if (!Number.isFinite(parsed)) {
		throw new MalformedEventError(`Field "${key}" is not numeric`, frame);
	}
	return parsed;
}

function readOptionalNumber(data: Json, key: string, frame: string): number | null {
	return data[key] === undefined || data[key] === null
		? null
		: readNumber(data, key, frame);
}

function readSide(data: Json, frame: string): TradeSide {
	const side = data.side;
	if (side !== 'buy' && side !== 'sell') {
		throw new MalformedEventError(`Unknown trade side "${String(side)}"`, frame);
	}
	return side;
}

function symbolOf(topic: string, frame: string): string {
	const separator = topic.lastIndexOf(':');
	if (separator < 0 || separator === topic.length - 1) {
		throw new MalformedEventError(`Topic "${topic}" has no symbol`, frame);
	}
	return topic.slice(separator + 1);
}

function parseMessage(message: Json, frame: string): MarketEvent {
	const rawTs = RAW_TS.exec(frame)?.[1] ?? null;
	const { topic, subject, data } = message;
	if (typeof topic !== 'string' || typeof subject !== 'string' || !isObject(data)) {
		throw new MalformedEventError('Message frame missing topic, subject or data', frame);
	}
	const symbol = symbolOf(topic, frame);

	if (topic.startsWith('/contractMarket/tickerV2') && subject === 'tickerV2') {
		return {
			kind: 'ticker',
			symbol,
			bidPrice: readNumber(data, 'bestBidPrice', frame),
			bidSize: readNumber(data, 'bestBidSize', frame),
			askPrice: readNumber(data, 'bestAskPrice', frame),
			askSize: readNumber(data, 'bestAskSize', frame),
			eventTimeNs: readTimestamp(data, rawTs, frame),
		};
	}

	if (topic.startsWith('/contractMarket/execution') && subject === 'match') {
		return {
			kind: 'trade',
			symbol,
			price: readNumber(data, 'price', frame),
			size: readNumber(data, 'size', frame),
			side: readSide(data, frame),
			eventTimeNs: readTimestamp(data, rawTs, frame),
		};
	}

	if (topic.startsWith('/contract/instrument')) {
		const eventTimeNs = readNumber(data, 'timestamp', frame) * NS_PER_MS;
		if (subject === 'mark.index.price') {
			return {
				kind: 'instrument',
				symbol,
				markPrice: readNumber(data, 'markPrice', frame),
				indexPrice: readOptionalNumber(data, 'indexPrice', frame),
				fundingRate: null,
				eventTimeNs,
			};
		}
		if (subject === 'funding.rate') {
			return {
				kind: 'instrument',
				symbol,
				markPrice: null,
				indexPrice: null,
				fundingRate: readNumber(data, 'fundingRate', frame),
				eventTimeNs,
			};
		}
	}

	throw new MalformedEventError(`Unsupported subject "${subject}" on ${topic}`, frame);
}

/**
 * Parses one text frame from the market-data socket.
 * Throws MalformedEventError for anything that is not a known control frame or market event.
 */
export function parseFeedFrame(frame: string): FeedFrame {
	let message: unknown;
	try {
		message = JSON.parse(frame);
	} catch {
		throw new MalformedEventError('Frame is not valid JSON', frame);
	}
	if (!isObject(message)) {
		throw new MalformedEventError('Frame is not a JSON object', frame);
	}

	const id = typeof message.id === 'string' ? message.id : String(message.id ?? '');

	switch (message.type) {
		case 'welcome':
			return { type: 'welcome', id };
		case 'pong':
			return { type: 'pong' };
		case 'ack':
			return { type: 'ack', id };
		case 'error':
			return {
				type: 'error',
				code: String(message.code ?? ''),
				message: String(message.data ?? 'unknown error'),
			};
		case 'message':
			return { type: 'event', event: parseMessage(message, frame) };
		default:
			throw new MalformedEventError(`Unknown frame type "${String(message.type)}"`, frame);
	}
}
