#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { config } from '../config.js';
import { metaCommand } from './commands/meta.js';
import { poolCommand } from './commands/pool.js';
import { tokenCommand } from './commands/token.js';

const program = new Command();

program
    .name('amm')
    .description('Constant-product exchange with signed relayed swaps')
    .version(config.version)
    .option('-d, --data <path>', 'Data directory path', config.storage.dataDir);

program.addCommand(tokenCommand);
program.addCommand(poolCommand);
program.addCommand(metaCommand);

program.parse();
