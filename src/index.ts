import { createApp, LOG_PREFIX } from './app';
import { loadConfig } from './config';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`${LOG_PREFIX} ${config.name} started on port ${config.port} (${config.mode}, ${config.rounding}, ${config.unmatched})`);
});
