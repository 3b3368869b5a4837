/**
 * Executable entry point
 */

import { run } from './cli.js';

void run();
