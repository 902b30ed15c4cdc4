import express from 'express';
import { createServer } from 'node:http';
import { loadConfig, type MonitorConfig } from './config.js';
import { createRouter } from './api/routes.js';
import { errorMessage } from './monitor/errors.js';
import { createMonitor, shutdownTimeoutMs, startMonitor, stopMonitor } from './monitor/index.js';

function loadConfigOrExit(): MonitorConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error('[Config]', errorMessage(err));
    process.exit(1);
  }
}

const config = loadConfigOrExit();

const monitor = createMonitor(config);

// Create Express app and HTTP server
const app = express();
const server = createServer(app);

app.use(express.json());
app.use(createRouter(monitor));

try {
  await startMonitor(monitor);
} catch (err) {
  console.error('[Monitor] Failed to start:', errorMessage(err));
  process.exit(1);
}

server.listen(config.port, () => {
  console.log(`Host monitor running on port ${config.port}`);
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Remediation: ${config.remediationMode} (${config.remediatorUrl})`);
  console.log(`  Chat channel: ${config.chat.chatChannel}`);
  console.log(`  Status: http://localhost:${config.port}/api/monitor/status`);
});

// Graceful shutdown
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\n[${signal}] Shutting down gracefully...`);

  // Force exit only once in-flight work has overrun its own timeouts
  const forceAfterMs = shutdownTimeoutMs(config);
  setTimeout(() => {
    console.error(`Forced shutdown after ${forceAfterMs / 1000}s.`);
    process.exit(1);
  }, forceAfterMs).unref();

  try {
    await stopMonitor(monitor);
  } catch (err) {
    console.error('[Monitor] Error during shutdown:', errorMessage(err));
  }

  server.close(() => {
    console.log('Server closed.');
    process.exit(0);
  });
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
