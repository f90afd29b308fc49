#!/usr/bin/env tsx
import { completeExport } from '../tasks/lifecycle.js';
import { runTaskCommand } from './task-command.js';

await runTaskCommand('complete-export', (store, taskId) => completeExport(store, taskId));
