/**
 * TCP listener: one Http2ServerConnection per accepted socket.
 * Connections share nothing; each owns its socket until it closes.
 */
import { createServer as createNetServer, type Server } from "node:net";
import type { Duplex } from "node:stream";
import { ByteStream } from "./http2/byte-stream.js";
import { Http2ServerConnection, type ServerConnectionOptions } from "./http2/connection.js";

export interface Http2ServerOptions extends ServerConnectionOptions {
  /** Deadline for each socket read in ms; 0 disables it (default: 30000) */
  readTimeout?: number;
  /** Called with every connection before it starts running */
  onConnection?: (connection: Http2ServerConnection) => void;
}

const DEFAULT_READ_TIMEOUT = 30_000;

/**
 * Run the HTTP/2 engine on an already-accepted socket.
 * Resolves with the connection once it has closed.
 */
export async function handleSocket(
  socket: Duplex,
  options: Http2ServerOptions = {},
): Promise<Http2ServerConnection> {
  const stream = new ByteStream(socket, {
    readTimeout: options.readTimeout ?? DEFAULT_READ_TIMEOUT,
  });
  const connection = new Http2ServerConnection(stream, options);
  options.onConnection?.(connection);
  await connection.run();
  return connection;
}

/** Create a cleartext (prior-knowledge) HTTP/2 server. Call listen() on the result. */
export function createServer(options: Http2ServerOptions = {}): Server {
  const logger = options.logger ?? console;

  return createNetServer(socket => {
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    logger.debug(`[h2:server] accepted ${peer}`);

    handleSocket(socket, options)
      .then(connection => {
        const reason = connection.closeReason;
        logger.debug(`[h2:server] ${peer} closed${reason ? ` (${reason.message})` : ""}`);
      })
      .catch((err: unknown) => {
        logger.warn(`[h2:server] ${peer} connection failed:`, err);
        socket.destroy();
      });
  });
}
