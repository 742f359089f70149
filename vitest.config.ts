import os from 'node:os';
import path from 'node:path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Keep the CLI logger singleton from writing into the working tree.
    env: {
      INVENTORY_LOG_FILE: path.join(os.tmpdir(), 'instance-inventory.test.log'),
    },
  },
});
