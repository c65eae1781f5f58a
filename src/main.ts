/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action main entry point (action.yml `runs.main`).
 */

import { run } from './run';

void run();
