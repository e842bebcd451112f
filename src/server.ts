import { WebSocketServer } from 'ws';
import { createContainer } from './container';
import { createApp } from './app';
import { WebSocketBridge } from './infrastructure/websocket/WebSocketBridge';

async function startServer() {
  const container = await createContainer();
  const { config, logger, eventBus } = container;

  logger.debug(config.toString());

  const app = createApp(container);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Orchestrator listening on http://${config.host}:${config.port}`);
  });

  // Start WebSocket server with event bus bridge
  const wss = new WebSocketServer({ server });
  const wsBridge = new WebSocketBridge(wss, eventBus, logger);
  wss.on('connection', () => {
    logger.debug('WebSocket client connected', { clients: wsBridge.getClientCount() });
  });

  // Graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      process.exit(1);
    }
    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    const forceExitTimeout = setTimeout(() => {
      process.exit(1);
    }, 5000);

    try {
      wss.clients.forEach(client => {
        client.close();
      });
      wss.close();

      await container.shutdown();

      server.close(() => {
        clearTimeout(forceExitTimeout);
        process.exit(0);
      });
    } catch (err) {
      logger.error('Shutdown failed:', err instanceof Error ? err : new Error(String(err)));
      clearTimeout(forceExitTimeout);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  return { app, server, container };
}

startServer().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
