import 'dotenv/config';
import express from 'express';
import http from 'http';
import cors from 'cors';
import { Server } from 'socket.io';
import pino from 'pino';
import { config } from './config';
import { createCompletionModel, loadBackendEnv } from './bootstrap/env';
import { createPipeline } from './orchestrator';
import { registerRoutes } from './routes';
import { initWs } from './ws';
import { initMetricsRoute } from './services/metrics';

const log = pino({ name: 'server', level: config.logLevel });

const envConfig = loadBackendEnv();
const model = createCompletionModel(envConfig);

const app = express();
app.use(express.json({ limit: '2mb' }));
app.use(cors({
  origin(origin, callback) {
    if (!origin) return callback(null, true);
    if (config.corsOrigins.includes('*') || config.corsOrigins.includes(origin)) {
      return callback(null, true);
    }
    return callback(new Error('Not allowed by CORS'));
  },
  credentials: true
}));

const server = http.createServer(app);
const io = new Server(server, {
  cors: {
    origin: config.corsOrigins,
    credentials: true
  }
});

const pipeline = createPipeline({ model, observer: initWs(io) });

initMetricsRoute(app);
registerRoutes(app, pipeline);

const PORT = config.port;
server.listen(PORT, () => log.info({ PORT, provider: model.provider }, 'backend up'));
