#!/usr/bin/env node
// ============================================================================
// Shardline - CLI
//
// shardline CalculatorTest ParserTest#parsesEmpty    # Run a class and a method
// shardline --parallel-threads 0 @build/tests.txt   # One worker per CPU
// shardline --help                                  # Show help
// ============================================================================

import { runCommand } from './command.js';

runCommand(process.argv.slice(2))
	.then((code) => process.exit(code))
	.catch((err: unknown) => {
		console.error('Fatal error:', err instanceof Error ? err.message : String(err));
		process.exit(1);
	});
