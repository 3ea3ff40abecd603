import chalk from 'chalk';
import type { GlobalOptions } from '../types/index.js';
import { createContext, handleError, printJson, withSpinner } from './shared.js';

/**
 * Checks credentials by asking Jira who we are.
 */
export async function testConnection(options: GlobalOptions): Promise<void> {
  try {
    const { client, reconciler } = createContext(options);
    const { server, user } = await withSpinner(
      `Connecting to ${client.baseUrl}...`,
      async () => ({
        server: await client.getServerInfo(),
        user: await reconciler.currentUser(),
      }),
      () => 'Connected to Jira',
      'Connection failed'
    );

    if (options.json) {
      printJson({ success: true, server, user });
      return;
    }

    console.log(`  Server: ${chalk.cyan(server.serverTitle ?? server.baseUrl ?? client.baseUrl)}`);
    if (server.version) {
      console.log(`  Version: ${chalk.dim(server.version)}`);
    }
    console.log(`  User: ${chalk.green(user.displayName)}${user.email ? chalk.dim(` <${user.email}>`) : ''}`);
  } catch (err) {
    handleError(err);
  }
}
