import chalk from 'chalk';
import { loadConfig, loadDotEnv } from './config.js';
import { createApp } from './webServer.js';

async function start(): Promise<void> {
  await loadDotEnv();
  const config = loadConfig();
  const app = createApp(config);
  app.listen(config.port, () => {
    console.log(chalk.green(`Barcode label sheets web listening on port ${config.port}`));
  });
}

start().catch(error => {
  console.error(chalk.red.bold('Web server failed to start:'), error);
  process.exitCode = 1;
});
