import { loadConfig } from './config';
import { createServer, LOG_TAG } from './server';

const config = loadConfig();
const { server } = createServer(config);

server.listen(config.port, () => {
  console.log(`${LOG_TAG} listening on http://localhost:${config.port} (rules: ${config.ruleSet})`);
});
