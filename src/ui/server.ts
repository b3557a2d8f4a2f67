import 'dotenv/config';
import express from 'express';
import crypto from 'crypto';
import { AddressInfo } from 'net';
import { buildContext } from '../core/context';
import { registerRoutes } from './routes';

const ctx = buildContext();
const app = express();
const csrfToken = process.env.UI_CSRF_TOKEN || crypto.randomUUID();
const desiredPort = Number(process.env.UI_PORT || ctx.config.uiPort || 8787);
const desiredBind = process.env.UI_BIND || ctx.config.uiBind || '127.0.0.1';

registerRoutes(app, ctx, csrfToken);

const portOf = (address: string | AddressInfo | null) => (address && typeof address === 'object' ? address.port : '?');

const startServer = (port: number, bind: string, allowFallback = true) => {
  const server = app.listen(port, bind, () => {
    console.log(`API running at http://${bind}:${portOf(server.address())} (x-csrf-token: ${csrfToken})`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    if (allowFallback && (err.code === 'EACCES' || err.code === 'EPERM' || err.code === 'EADDRINUSE')) {
      console.warn(`API port ${port} blocked (${err.code}); retrying on an ephemeral port.`);
      startServer(0, bind, false);
      return;
    }
    console.error('API failed to start', err);
    process.exit(1);
  });
};

startServer(desiredPort, desiredBind);
