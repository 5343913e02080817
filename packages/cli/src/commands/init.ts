/**
 * hydra init - write hydra.config.json
 */

import chalk from 'chalk';
import { ConfigManager, CONFIG_FILENAME } from '../config.js';

export interface InitOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  console.log(chalk.blue.bold('\n🏗️  Hydra Initialization\n'));

  const configManager = new ConfigManager();

  if (configManager.exists() && !options.force) {
    console.log(chalk.yellow(`⚠️  ${CONFIG_FILENAME} already exists`));
    console.log(chalk.gray('Run again with --force to overwrite it'));
    return;
  }

  const config = configManager.init({ force: options.force });
  console.log(chalk.green(`✅ Created ${CONFIG_FILENAME}`));

  console.log(chalk.gray(`   Server:  ${config.server.host}:${config.server.port}`));
  console.log(chalk.gray(`   Data:    ${config.server.dataDir}`));
  console.log(chalk.gray(`   Client:  ${config.client.url}`));

  console.log(chalk.blue.bold('\n✨ Hydra initialized successfully!\n'));
  console.log(chalk.gray('Next steps:'));
  console.log(chalk.gray('  1. Run: hydra serve'));
  console.log(chalk.gray('  2. Send requests to http://<host>:<port>/ingress/...'));
  console.log(chalk.gray('  3. Browse them with: hydra logs\n'));
}
