// Addressing
export { Multiaddr, parseMultiaddr, toMultiaddr } from '@/address/multiaddr.js'
export type { AddressComponent, SocketAddress } from '@/address/multiaddr.js'
export type { ProtocolName } from '@/address/protocols.js'

// Channels
export type { ByteChannel } from '@/channel/types.js'
export { ChannelReader, PrefixedChannel } from '@/channel/channel-reader.js'

// Transports and upgrades
export { TcpTransport } from '@/transport/tcp-transport.js'
export type { IncomingConnection, Listener, Transport, SocketConfig, TcpTransportOptions } from '@/transport/types.js'
export { ComposableTransport, UpgradedTransport } from '@/upgrade/upgraded-transport.js'
export type { ConnectionRole, Destroyable, UpgradeContext, UpgradeStage } from '@/upgrade/types.js'

// Security
export { SecurityNegotiator, selectMode, rankModes, MAX_ANNOUNCEMENT_LENGTH } from '@/security/negotiator.js'
export { PlaintextMode, PLAINTEXT_PROTOCOL } from '@/security/plaintext.js'
export { SecureChannelMode, SECURE_CHANNEL_PROTOCOL } from '@/security/secure-channel/mode.js'
export { createSecurityModes, SECURITY_PROTOCOLS } from '@/security/modes.js'
export { KeyPair, generateKeyPair, loadKeyPair, peerIdFromPublicKey } from '@/security/key-pair.js'
export type { KeyMaterial } from '@/security/key-pair.js'
export type { SecuredChannel, SecuredConnection, SecurityMode } from '@/security/types.js'

// Multiplexing
export { MplexMuxer } from '@/muxer/mplex/muxer.js'
export type { MplexOptions } from '@/muxer/mplex/muxer.js'
export { MPLEX_PROTOCOL } from '@/muxer/mplex/codec.js'
export { MuxerStage } from '@/muxer/stage.js'
export type { MuxerLimits } from '@/muxer/stage.js'
export { ConnectionReuse, ReuseTransport } from '@/muxer/connection-reuse.js'
export type { ConnectionReuseStats } from '@/muxer/connection-reuse.js'
export type { MuxedConnection, MuxedStream, StreamDirection } from '@/muxer/types.js'

// Protocol negotiation
export { handle, select, MULTISTREAM_PROTOCOL } from '@/negotiation/multistream.js'
export type { NegotiatedStream, NegotiationOptions } from '@/negotiation/multistream.js'
export { ProtocolRouter } from '@/negotiation/router.js'
export type { StreamContext, StreamHandler } from '@/negotiation/router.js'

// Echo
export { encodeFrame, FrameDecoder, DEFAULT_MAX_FRAME_LENGTH } from '@/framing/frame-decoder.js'
export { FramedReader } from '@/protocols/echo/framed-reader.js'
export type { FrameEvent } from '@/protocols/echo/framed-reader.js'
export { EchoSession, ECHO_PROTOCOL } from '@/protocols/echo/echo-session.js'
export type { EchoSessionOptions, EchoSessionResult, EchoSessionState } from '@/protocols/echo/echo-session.js'
export { createEchoHandler } from '@/protocols/echo/handler.js'

// Server and client
export { createStack } from '@/stack.js'
export type { Stack, StackOptions } from '@/stack.js'
export { ConnectionSupervisor } from '@/server/supervisor.js'
export type { SupervisorOptions, SupervisorStats } from '@/server/supervisor.js'
export { createEchoServer } from '@/server/echo-server.js'
export type { EchoServer, EchoServerOptions } from '@/server/echo-server.js'
export { Dialer } from '@/client/dialer.js'
export { EchoClient } from '@/client/echo-client.js'
export type { EchoClientOptions } from '@/client/echo-client.js'

// Errors
export {
	SwitchyardError,
	AddressParseError,
	UnsupportedAddressError,
	KeyMaterialError,
	ConnectionError,
	ConnectionTimeoutError,
	NegotiationError,
	SecurityHandshakeError,
	ConnectionIoError,
	StreamIoError,
	FrameTooLargeError,
	toError,
} from '@/errors.js'
export type { ErrorScope } from '@/errors.js'

// Logger
export { createLogger, noopLogger, errorContext, LOG_LEVELS } from '@/logger.js'
export type { Logger, LogLevel } from '@/logger.js'
