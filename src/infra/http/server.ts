import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { getDatabase, initDatabase } from '../db/client.js';
import { createApp } from './app.js';

dotenv.config();

const config = loadConfig();
initDatabase(config);

const app = createApp({ getDatabase });

app.listen(config.port, '0.0.0.0', () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
  console.log(`Diagnostics: http://localhost:${config.port}/test`);
});

export default app;
