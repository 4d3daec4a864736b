#!/usr/bin/env node

import { config } from 'dotenv';
import { createProgram } from './program.js';

// Project .env (PARITYKIT_* settings, adapter credentials)
config();

await createProgram().parseAsync(process.argv);
