#!/usr/bin/env node

/**
 * CLI entry point for the yieldwatch command
 */

import dotenv from 'dotenv';
import { buildProgram } from './program.js';

// Load environment variables from .env file
dotenv.config();

await buildProgram().parseAsync(process.argv);
