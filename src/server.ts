/**
 * Server Entry Point
 *
 * Initialization sequence:
 * 1. Load .env and config
 * 2. Create the rate limiter and start its idle sweep
 * 3. Start Express server
 * 4. Setup graceful shutdown
 */

import "dotenv/config";
import { createApp } from "./app.js";
import { config } from "./config/env.js";
import { SmtpRelay } from "./services/mailRelay.js";
import { RateLimiter } from "./services/rateLimiter.js";

function start() {
  console.log("🚀 Mail relay API starting...");

  // Step 1: Rate limiter
  const limiter = new RateLimiter({
    maxPerSec: config.RATE_LIMIT_PER_SECOND,
    cleanupIntervalMs: config.RATE_LIMIT_CLEANUP_INTERVAL_MS,
    idleTtlMs: config.RATE_LIMIT_IDLE_TTL_MS,
  });
  limiter.start();

  // Step 2: SMTP relay
  const relay = new SmtpRelay({
    host: config.SMTP_HOST,
    port: config.SMTP_PORT,
    secure: config.SMTP_SECURE,
    timeoutMs: config.SMTP_TIMEOUT_MS,
  });

  const app = createApp({
    limiter,
    relay,
    bodyLimit: config.BODY_LIMIT,
    nodeEnv: config.NODE_ENV,
  });

  // Step 3: Start server
  const server = app.listen(config.PORT, () => {
    console.log(`\n✅ API running on http://localhost:${config.PORT}`);
    console.log(`📝 Environment: ${config.NODE_ENV}`);
    console.log(`📮 SMTP relay: ${config.SMTP_HOST}:${config.SMTP_PORT}`);
    console.log(
      `⚡ Rate limit: ${limiter.policy.maxPerSec}/s per user, burst ${limiter.policy.bucketSize}`
    );
    console.log(`\nReady to receive requests...\n`);
  });

  server.on("error", (err) => {
    console.error("❌ Failed to start server:", err);
    process.exit(1);
  });

  // Step 4: Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    limiter.stop();
    server.close(() => {
      console.log("✅ Server stopped");
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error("❌ Forced shutdown after 10s timeout");
      process.exit(1);
    }, 10000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

start();
