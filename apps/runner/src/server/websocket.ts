import { WebSocket, WebSocketServer, type RawData } from 'ws';
import type { CatalogService } from '@courier/catalog';
import { SuiteEngine } from './engine.js';
import { RunnerCommandSchema, type RunnerEvent, type RunnerEventType, type SuiteRun } from '../shared/types.js';

const FORWARDED_EVENTS: Array<[string, RunnerEventType]> = [
  ['run:started', 'RUN_STARTED'],
  ['run:updated', 'RUN_UPDATED'],
  ['run:completed', 'RUN_COMPLETED'],
  ['run:failed', 'RUN_FAILED'],
  ['run:cancelled', 'RUN_CANCELLED'],
];

export function setupWebSocket(wss: WebSocketServer, engine: SuiteEngine, catalog: CatalogService): void {
  for (const [event, type] of FORWARDED_EVENTS) {
    engine.on(event, (run: SuiteRun) => {
      broadcast(wss, { type, payload: run, timestamp: Date.now() });
    });
  }

  wss.on('connection', (ws: WebSocket) => {
    console.log('Client connected');

    ws.on('message', async (message: RawData) => {
      try {
        const parsed = RunnerCommandSchema.safeParse(JSON.parse(message.toString()));
        if (!parsed.success) {
          console.warn('Malformed command:', parsed.error.issues.map((issue) => issue.message).join('; '));
          return;
        }
        const command = parsed.data;

        switch (command.type) {
          case 'RUN_START':
            if (command.payload.suiteId) {
              try {
                const runId = await engine.startRun(command.payload.suiteId, {
                  variables: command.payload.variables,
                  configs: command.payload.configs,
                });
                send(ws, { type: 'RUN_STARTED', payload: { runId }, timestamp: Date.now() });
              } catch (err) {
                send(ws, {
                  type: 'RUN_FAILED',
                  payload: { error: err instanceof Error ? err.message : String(err) },
                  timestamp: Date.now(),
                });
              }
            }
            break;

          case 'RUN_CANCEL':
            if (command.payload.runId) {
              engine.cancelRun(command.payload.runId);
            }
            break;

          case 'GET_STATUS':
            if (command.payload.runId) {
              const run = engine.getRun(command.payload.runId);
              send(ws, {
                type: 'STATUS_UPDATE',
                payload: run ?? { error: 'Run not found' },
                timestamp: Date.now(),
              });
            } else {
              send(ws, { type: 'STATUS_UPDATE', payload: { runs: engine.listRuns() }, timestamp: Date.now() });
            }
            break;

          case 'GET_SUITES':
            send(ws, { type: 'SUITES_LIST', payload: catalog.listSuites(), timestamp: Date.now() });
            break;

          default:
            console.warn('Unknown command type:', command.type);
        }
      } catch (err) {
        console.error('WebSocket error:', err);
      }
    });

    ws.on('close', () => {
      console.log('Client disconnected');
    });
  });
}

function send(ws: WebSocket, message: RunnerEvent) {
  ws.send(JSON.stringify(message));
}

function broadcast(wss: WebSocketServer, message: RunnerEvent) {
  const data = JSON.stringify(message);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    }
  });
}
