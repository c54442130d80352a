export {
	formatSocketAddress,
	inetAddress,
	namedAddress,
	numericHost,
	type InetSocketAddress,
	type NamedSocketAddress,
	type SocketAddress,
} from "./address.js";
export { SyslogSourceConnector, type ConnectorProperties } from "./connector.js";
export {
	FrameReader,
	decodeSyslogMessage,
	splitFrames,
	type DecodeOptions,
	type FrameSplit,
} from "./decoder.js";
export {
	SyslogSourceError,
	ResolutionError,
	TranslationError,
	TransportError,
	QueueClosedError,
} from "./errors.js";
export { syslogEventSchema, type SyslogEvent, type ValidSyslogEvent } from "./event.js";
export {
	SyslogListener,
	createSyslogListener,
	type Listener,
	type ListenerFactory,
	type SyslogListenerOptions,
} from "./listener.js";
export { HandoffQueue } from "./queue.js";
export {
	DnsHostnameResolver,
	type DnsHostnameResolverOptions,
	type HostnameResolver,
	type ResolvedAddress,
} from "./resolver.js";
export { SyslogSourceTask, type SourceTaskDependencies } from "./task.js";
export {
	SyslogEventTranslator,
	type EventTranslatorOptions,
	type SyslogEventHandler,
} from "./translator.js";
export { CONNECTOR_VERSION } from "./version.js";
