// ═══════════════════════════════════════════════════════════════════════════════
// TEST SETUP — Quiet Logging
// ═══════════════════════════════════════════════════════════════════════════════

import { configureLogger } from '../observability/logging/index.js';

// Breakers and wrappers log every trip and retry; keep test output readable.
configureLogger({ level: 'fatal', pretty: false });
