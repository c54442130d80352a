import { type Socket as UdpSocket, createSocket } from "node:dgram";
import { type Server, type Socket as TcpSocket, createServer, isIP } from "node:net";
import { TextDecoder } from "node:util";
import type { Logger } from "@sysbridge/core-telemetry";
import { type SocketAddress, inetAddress, namedAddress } from "./address.js";
import { FrameReader, decodeSyslogMessage } from "./decoder.js";
import { TransportError } from "./errors.js";
import type { SyslogEventHandler } from "./translator.js";

export interface SyslogListenerOptions {
	protocol: "udp" | "tcp";
	host: string;
	port: number;
	charset: string;
	maxMessageSize: number;
	logger: Logger;
}

export interface Listener {
	start(): Promise<void>;
	stop(): Promise<void>;
}

export type ListenerFactory = (
	options: SyslogListenerOptions,
	handler: SyslogEventHandler,
) => Listener;

function transportError(error: unknown, message: string): TransportError {
	const reason = error instanceof Error ? error.message : String(error);
	return new TransportError(`${message}: ${reason}`, { cause: error });
}

/**
 * Binds a UDP socket or TCP server and reports every received message to
 * the handler.
 */
export class SyslogListener implements Listener {
	private readonly options: SyslogListenerOptions;
	private readonly handler: SyslogEventHandler;
	private readonly decoder: TextDecoder;
	private readonly localAddress: SocketAddress;
	private readonly connections = new Set<TcpSocket>();
	private udpSocket: UdpSocket | undefined;
	private tcpServer: Server | undefined;
	private listening = false;

	constructor(options: SyslogListenerOptions, handler: SyslogEventHandler) {
		this.options = options;
		this.handler = handler;
		this.decoder = new TextDecoder(options.charset);
		this.localAddress = inetAddress(options.host, options.port);
	}

	async start(): Promise<void> {
		await this.handler.initialize?.();
		if (this.options.protocol === "udp") {
			await this.startUdp();
		} else {
			await this.startTcp();
		}
		this.listening = true;
		this.options.logger.info("Syslog listener started", {
			protocol: this.options.protocol,
			host: this.options.host,
			port: this.options.port,
		});
	}

	async stop(): Promise<void> {
		if (!this.listening) return;
		this.listening = false;

		const socket = this.udpSocket;
		if (socket) {
			this.udpSocket = undefined;
			await new Promise<void>((resolve) => socket.close(() => resolve()));
		}

		const server = this.tcpServer;
		if (server) {
			this.tcpServer = undefined;
			for (const connection of this.connections) {
				connection.destroy();
			}
			this.connections.clear();
			await new Promise<void>((resolve, reject) =>
				server.close((error) => (error ? reject(error) : resolve())),
			);
		}

		await this.handler.destroy?.();
		this.options.logger.info("Syslog listener stopped", { protocol: this.options.protocol });
	}

	private dispatch(address: SocketAddress, bytes: Buffer): void {
		try {
			const text = this.decoder.decode(bytes.subarray(0, this.options.maxMessageSize));
			const event = decodeSyslogMessage(text, {
				charset: this.options.charset,
				receivedAt: new Date(),
			});
			this.handler.onEvent(address, event);
		} catch (error) {
			this.handler.onError(address, transportError(error, "Failed to handle syslog message"));
		}
	}

	private startUdp(): Promise<void> {
		const socket = createSocket(isIP(this.options.host) === 6 ? "udp6" : "udp4");
		this.udpSocket = socket;

		socket.on("message", (message, remote) => {
			this.dispatch(inetAddress(remote.address, remote.port), message);
		});

		return new Promise((resolve, reject) => {
			const onBindError = (error: Error) => {
				this.udpSocket = undefined;
				reject(transportError(error, "UDP bind failed"));
			};
			socket.once("error", onBindError);
			socket.bind(this.options.port, this.options.host, () => {
				socket.off("error", onBindError);
				socket.on("error", (error) => {
					this.handler.onError(this.localAddress, transportError(error, "UDP socket error"));
				});
				resolve();
			});
		});
	}

	private startTcp(): Promise<void> {
		const server = createServer((connection) => this.accept(connection));
		this.tcpServer = server;

		return new Promise((resolve, reject) => {
			const onListenError = (error: Error) => {
				this.tcpServer = undefined;
				reject(transportError(error, "TCP listen failed"));
			};
			server.once("error", onListenError);
			server.listen(this.options.port, this.options.host, () => {
				server.off("error", onListenError);
				server.on("error", (error) => {
					this.handler.onError(this.localAddress, transportError(error, "TCP server error"));
				});
				resolve();
			});
		});
	}

	private accept(connection: TcpSocket): void {
		this.connections.add(connection);
		const remote =
			connection.remoteAddress === undefined
				? namedAddress("unknown")
				: inetAddress(connection.remoteAddress, connection.remotePort ?? 0);
		const reader = new FrameReader(this.options.maxMessageSize);

		connection.on("data", (chunk: Buffer) => {
			for (const frame of reader.push(chunk)) {
				this.dispatch(remote, frame);
			}
		});

		connection.on("end", () => {
			const tail = reader.end();
			if (tail) this.dispatch(remote, tail);
		});

		connection.on("close", () => {
			this.connections.delete(connection);
		});

		connection.on("error", (error) => {
			this.handler.onError(remote, transportError(error, "TCP connection error"));
		});
	}
}

export const createSyslogListener: ListenerFactory = (options, handler) =>
	new SyslogListener(options, handler);
