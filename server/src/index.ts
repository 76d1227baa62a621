import { createApp } from './app';
import { loadConfig, loadEnvFile } from './config';
import { openDatabase } from './db';
import { ProjectStore } from './store';

loadEnvFile();

const config = loadConfig();
const db = openDatabase(config.databasePath);
const store = new ProjectStore(db);
const app = createApp(store, config);

const server = app.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`API listening on http://localhost:${config.port} (db: ${config.databasePath})`);
});

function shutdown(signal: string) {
  console.log(`${signal} received, closing`);
  server.close(err => {
    if (err) console.error('Error while closing server:', err);
    db.close();
    process.exit(err ? 1 : 0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
