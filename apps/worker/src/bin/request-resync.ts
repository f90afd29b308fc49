#!/usr/bin/env tsx
import { requestResync } from '../tasks/lifecycle.js';
import { runTaskCommand } from './task-command.js';

await runTaskCommand('resync', (store, taskId) => requestResync(store, taskId));
