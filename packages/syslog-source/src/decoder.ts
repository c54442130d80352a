import type { SyslogEvent } from "./event.js";

export interface DecodeOptions {
	charset?: string;
	/** Used as the event date when the header carries none */
	receivedAt?: Date;
}

export interface FrameSplit {
	frames: Buffer[];
	/** Bytes of an incomplete trailing frame */
	remainder: Buffer;
}

const MAX_PRI = 191;
const PRI = /^<(\d{1,3})>/;
const RFC5424_HEADER = /^([1-9]\d{0,2}) (\S+) (\S+) (\S+) (\S+) (\S+)(?: |$)/;
const RFC3164_TIMESTAMP = /^([A-Z][a-z]{2}) {1,2}(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) /;
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const NIL = "-";
const BOM = "\uFEFF";
const DAY_MS = 24 * 60 * 60 * 1000;

interface Header {
	date?: Date;
	host?: string;
	message: string;
}

function nilToUndefined(value: string | undefined): string | undefined {
	return value === undefined || value === NIL ? undefined : value;
}

/** Skip `-` or a run of `[...]` SD elements; returns the index after them. */
function structuredDataEnd(text: string): number {
	if (text.startsWith(NIL)) return 1;

	let i = 0;
	while (text[i] === "[") {
		let quoted = false;
		i++;
		while (i < text.length) {
			const ch = text[i];
			if (ch === "\\" && quoted) {
				i += 2;
				continue;
			}
			if (ch === '"') quoted = !quoted;
			i++;
			if (ch === "]" && !quoted) break;
		}
	}
	return i;
}

function parseRfc5424(rest: string, receivedAt: Date): Header | undefined {
	const header = RFC5424_HEADER.exec(rest);
	if (!header) return undefined;

	const timestamp = nilToUndefined(header[2]);
	const host = nilToUndefined(header[3]);

	let body = rest.slice(header[0].length);
	body = body.slice(structuredDataEnd(body));
	if (body.startsWith(" ")) body = body.slice(1);
	if (body.startsWith(BOM)) body = body.slice(BOM.length);

	const parsedDate = timestamp === undefined ? undefined : new Date(timestamp);
	const result: Header = {
		date:
			parsedDate && !Number.isNaN(parsedDate.getTime()) ? parsedDate : receivedAt,
		message: body,
	};
	if (host !== undefined) result.host = host;
	return result;
}

function parseRfc3164(rest: string, receivedAt: Date): Header {
	const stamp = RFC3164_TIMESTAMP.exec(rest);
	const month = stamp ? MONTHS.indexOf(stamp[1] ?? "") : -1;
	if (!stamp || month < 0) {
		return { date: receivedAt, message: rest };
	}

	const [, , day, hours, minutes, seconds] = stamp;
	let date = new Date(
		receivedAt.getFullYear(),
		month,
		Number(day),
		Number(hours),
		Number(minutes),
		Number(seconds),
	);
	// A December message read in early January belongs to the previous year
	if (date.getTime() - receivedAt.getTime() > DAY_MS) {
		date = new Date(date);
		date.setFullYear(receivedAt.getFullYear() - 1);
	}
	// Date rolls impossible days over (Feb 31 -> Mar 3)
	if (date.getMonth() !== month || date.getDate() !== Number(day)) {
		date = receivedAt;
	}

	const afterStamp = rest.slice(stamp[0].length);
	const space = afterStamp.indexOf(" ");
	if (space <= 0) {
		return { date, message: afterStamp };
	}
	return { date, host: afterStamp.slice(0, space), message: afterStamp.slice(space + 1) };
}

/**
 * Lenient header extraction for RFC 5424 and RFC 3164 messages. Text
 * without a valid PRI becomes the message as a whole.
 */
export function decodeSyslogMessage(text: string, options: DecodeOptions = {}): SyslogEvent {
	const receivedAt = options.receivedAt ?? new Date();
	const line = text.replace(/[\r\n\0]+$/, "");
	const charset = options.charset === undefined ? {} : { charset: options.charset };

	const pri = PRI.exec(line);
	const priority = pri ? Number(pri[1]) : Number.NaN;
	if (!pri || priority > MAX_PRI) {
		return { ...charset, date: receivedAt, message: line };
	}

	const rest = line.slice(pri[0].length);
	const header = parseRfc5424(rest, receivedAt) ?? parseRfc3164(rest, receivedAt);
	return {
		...charset,
		facility: priority >> 3,
		level: priority & 7,
		...header,
	};
}

const OCTET_COUNT = /^([1-9]\d{0,8}) /;
const DIGITS_ONLY = /^\d+$/;
const LF = 0x0a;
const CR = 0x0d;

interface OctetCount {
	/** Bytes taken by `LEN SP` */
	headerLength: number;
	/** Declared message length */
	length: number;
}

function readOctetCount(buffer: Buffer, offset: number): OctetCount | undefined {
	const head = buffer.subarray(offset, offset + 11).toString("latin1");
	const counted = OCTET_COUNT.exec(head);
	if (!counted) return undefined;
	return { headerLength: counted[0].length, length: Number(counted[1]) };
}

/**
 * Split a TCP stream into messages. Octet-counted frames (`LEN SP MSG`)
 * and newline-terminated frames may be mixed.
 */
export function splitFrames(buffer: Buffer): FrameSplit {
	const frames: Buffer[] = [];
	let offset = 0;

	while (offset < buffer.length) {
		const counted = readOctetCount(buffer, offset);
		if (counted) {
			const start = offset + counted.headerLength;
			const end = start + counted.length;
			if (end > buffer.length) break;
			frames.push(buffer.subarray(start, end));
			offset = end;
			continue;
		}

		// Possibly the start of a length prefix still in flight
		const head = buffer.subarray(offset, offset + 11).toString("latin1");
		if (DIGITS_ONLY.test(head) && offset + head.length === buffer.length) break;

		const newline = buffer.indexOf(LF, offset);
		if (newline === -1) break;
		let end = newline;
		if (end > offset && buffer[end - 1] === CR) end--;
		if (end > offset) frames.push(buffer.subarray(offset, end));
		offset = newline + 1;
	}

	return { frames, remainder: buffer.subarray(offset) };
}

/**
 * Per-connection framing state. A message longer than `maxFrameSize` is
 * delivered once, cut to that size, and the rest of it is discarded so
 * the frames after it stay aligned.
 */
export class FrameReader {
	private pending: Buffer = Buffer.alloc(0);
	/** Bytes of an oversize counted frame still to discard */
	private skipBytes = 0;
	/** Discard up to and including the next LF */
	private skipLine = false;

	constructor(private readonly maxFrameSize: number) {}

	push(chunk: Buffer): Buffer[] {
		let data = chunk;
		if (this.skipBytes > 0) {
			const skipped = Math.min(this.skipBytes, data.length);
			this.skipBytes -= skipped;
			data = data.subarray(skipped);
		}
		if (this.skipLine) {
			const newline = data.indexOf(LF);
			if (newline === -1) return [];
			this.skipLine = false;
			data = data.subarray(newline + 1);
		}
		if (data.length === 0) return [];

		this.pending = this.pending.length === 0 ? data : Buffer.concat([this.pending, data]);
		const { frames, remainder } = splitFrames(this.pending);
		this.pending = remainder;

		const cut = this.cutOversize();
		if (cut) frames.push(cut);
		return frames.map((frame) => this.clip(frame));
	}

	/** The unterminated tail, once the connection has ended */
	end(): Buffer | undefined {
		const pending = this.pending;
		this.pending = Buffer.alloc(0);
		if (pending.length === 0) return undefined;

		const counted = readOctetCount(pending, 0);
		const tail = counted ? pending.subarray(counted.headerLength) : pending;
		return tail.length === 0 ? undefined : this.clip(tail);
	}

	private cutOversize(): Buffer | undefined {
		const pending = this.pending;
		const counted = readOctetCount(pending, 0);
		if (counted) {
			const body = pending.length - counted.headerLength;
			if (counted.length <= this.maxFrameSize || body < this.maxFrameSize) return undefined;
			this.pending = Buffer.alloc(0);
			this.skipBytes = counted.length - body;
			return pending.subarray(counted.headerLength, counted.headerLength + this.maxFrameSize);
		}

		if (pending.length <= this.maxFrameSize) return undefined;
		this.pending = Buffer.alloc(0);
		this.skipLine = true;
		return pending.subarray(0, this.maxFrameSize);
	}

	private clip(frame: Buffer): Buffer {
		return frame.length > this.maxFrameSize ? frame.subarray(0, this.maxFrameSize) : frame;
	}
}
