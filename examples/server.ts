/**
 * Minimal cleartext HTTP/2 server (prior knowledge, no TLS).
 *
 *   PORT=8080 HOST=127.0.0.1 npm run example
 *   curl --http2-prior-knowledge http://127.0.0.1:8080/
 *
 * Set H2_HPACK=1 to send HPACK-encoded response headers, which curl can read;
 * the default plain-text header block is only meaningful to raw frame clients.
 */
import { createServer } from "../src/index.js";

const port = parseInt(process.env.PORT || "8080", 10);
const host = process.env.HOST || "127.0.0.1";

const server = createServer({
  headerEncoding: process.env.H2_HPACK === "1" ? "hpack" : "plain",
  respond: ({ streamId, headers }) => {
    const path = headers.find(([name]) => name === ":path")?.[1] ?? "/";
    return {
      status: 200,
      headers: [["content-type", "text/plain; charset=utf-8"]],
      body: `Hello from stream ${streamId} (${path})\n`,
    };
  },
});

server.listen(port, host, () => {
  console.log(`[h2:server] listening on ${host}:${port}`);
});

process.on("SIGINT", () => {
  server.close(() => process.exit(0));
});
