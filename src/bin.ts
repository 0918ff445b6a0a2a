#!/usr/bin/env node
import dotenv from 'dotenv';
import { run } from './cli';

// Load environment variables from .env file
dotenv.config();

run(process.argv.slice(2), { input: process.stdin, output: process.stdout, error: process.stderr })
	.then(code => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		console.error('Failed to title-case input:', error);
		process.exit(1);
	});
