import { startServer } from './app.js';

const PORT = Number(process.env.PORT) || 8080;

startServer(PORT).catch((err) => {
  console.error('[startup] failed to start server', err);
  process.exitCode = 1;
});
