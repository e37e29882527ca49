import express from 'express';
import helmet from 'helmet';
import compression from 'compression';
import cors from 'cors';
import config from './config';
import * as middleware from './middleware';
import routes from './routes';

const app = express();

// Trust proxy
app.set('trust proxy', 1);

// CORS
app.use(cors());

// Security headers (JSON only, nothing to render)
app.use(helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      connectSrc: ["'self'", 'wss:', 'ws:'],
      upgradeInsecureRequests: null,
    },
  },
  hsts: false,
}));

// Compression
app.use(compression());

// Request logging
app.use(middleware.requestLogger());

// Nothing here is cacheable
app.use(middleware.noStore());

// JSON body parser (before routes); traces are large
app.use(express.json({ limit: config.JSON_BODY_LIMIT }));

// Routes
app.use(routes);

app.use(middleware.notFoundHandler);
app.use(middleware.errorHandler);

export default app;
