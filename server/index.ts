// Load environment variables from .env file BEFORE any other imports
import 'dotenv/config';

import { createApp } from './app';
import { loadEngineConfig } from './config/engineConfig';
import { createLogger } from './lib/logger';
import { getPolicyStore } from './services/policyStore';

const log = createLogger({ module: 'server' });

const config = loadEngineConfig();

// Fail fast on a malformed policy pack
const store = getPolicyStore(config.policy);
log.info(
  { policyId: store.pack.policy_id, policyVersion: store.pack.policy_version, overlays: store.overlays.size },
  'Policy pack loaded'
);

const app = createApp(config);

app.listen(config.port, '0.0.0.0', () => {
  log.info({ port: config.port }, `serving on port ${config.port}`);
});
