#!/usr/bin/env -S node --import tsx

import { run } from './index.js';

run().catch((err: unknown) => {
	console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
	process.exitCode = 1;
});
