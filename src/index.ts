import { AppStateTracker } from './app/appState.js';
import { PushAuthClient } from './auth/pushAuthClient.js';
import { loadConfig } from './config.js';
import { logError, logInfo, logWarn, setLogLevel } from './logger.js';
import { PushDeliveryServer } from './notifications/webhookServer.js';
import { TerminalPromptPresenter } from './prompt/terminalPrompt.js';
import { NotificationAuthorizer } from './pushAuth/authorizer.js';
import { PushNotificationDispatcher } from './pushAuth/dispatcher.js';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (!config.delivery.enabled) {
    logWarn('Push delivery webhook is disabled; no notifications can arrive. Exiting.');
    return;
  }

  const client = new PushAuthClient({
    apiBase: config.pushAuth.apiBase,
    bearerToken: config.pushAuth.bearerToken,
    requestTimeoutMs: config.pushAuth.requestTimeoutMs,
  });

  const presenter = new TerminalPromptPresenter({
    input: process.stdin,
    output: process.stdout,
  });

  const authorizer = new NotificationAuthorizer({
    presentPrompt: (prompt) => presenter.present(prompt),
    authorize: (token) => client.authorizeLogin(token),
    acceptLabel: config.prompt.acceptLabel,
    rejectLabel: config.prompt.rejectLabel,
  });

  // Without a terminal nobody can answer a prompt, which is what background means here.
  const appState = new AppStateTracker(process.stdin.isTTY ? 'active' : 'background');

  const dispatcher = new PushNotificationDispatcher({ authorizer, appState });

  const server = new PushDeliveryServer({
    enabled: config.delivery.enabled,
    host: config.delivery.host,
    port: config.delivery.port,
    path: config.delivery.path,
    secret: config.delivery.secret,
    maxBodyBytes: config.delivery.maxBodyBytes,
    onNotification: (payload) => dispatcher.dispatch(payload),
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo(`Received ${signal}, shutting down...`);
    appState.setState('background');

    let exitCode = 0;
    try {
      presenter.dismiss();
      presenter.close();
      await dispatcher.idle();
      await server.stop();
    } catch (error) {
      logError('Shutdown error', error);
      exitCode = 1;
    } finally {
      process.exit(exitCode);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logInfo('Starting push auth approver');
  logInfo(`Authorization backend: ${config.pushAuth.apiBase}`);
  logInfo(`App state: ${appState.getState()}`);

  await server.start();
}

void main().catch((error) => {
  logError('Fatal startup error', error);
  process.exit(1);
});
