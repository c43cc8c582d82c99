import { createServer } from 'http';
import { WebSocketServer } from 'ws';
import { config } from 'dotenv';
import { CatalogService } from '@courier/catalog';
import { createApp } from './app.js';
import { setupWebSocket } from './websocket.js';
import { SuiteEngine } from './engine.js';

config();

const PORT = process.env.PORT || 3001;

const catalog = new CatalogService(process.env.COURIER_WORKDIR);
const engine = new SuiteEngine(catalog);

const app = createApp(catalog, engine);
const server = createServer(app);
const wss = new WebSocketServer({ server });

// WebSocket setup
setupWebSocket(wss, engine, catalog);

server.listen(PORT, () => {
  console.log(`Courier runner listening on port ${PORT} (${catalog.size} suites loaded from ${catalog.workingDir})`);
});

process.on('SIGINT', () => {
  wss.close();
  server.close();
  engine.destroy().then(
    () => process.exit(0),
    (err) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    },
  );
});
