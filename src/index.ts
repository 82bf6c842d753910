import type { Server } from 'http';
import { getConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { shortAddress } from './utils/address.js';
import { ChainClient } from './clients/polymarket/ChainClient.js';
import { DataApiClient } from './clients/polymarket/DataApiClient.js';
import { ClobOrderSubmitter } from './clients/polymarket/ClobOrderSubmitter.js';
import { CopyTradingService, serviceConfigFromAppConfig } from './services/copyTrading/index.js';
import { runSystemCheck, getOverallHealth } from './services/healthMonitor/index.js';
import { createApp, startApiServer, stopApiServer } from './api/server.js';

const log = logger('Main');

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  log.info('Starting Polymarket copy trading bot');

  // Load and validate configuration; errors here are fatal
  const config = getConfig();
  log.info('Configuration loaded', {
    env: config.env,
    proxyWallet: shortAddress(config.accounts.proxyWallet),
    traders: config.accounts.userAddresses.map(shortAddress),
    strategy: config.sizing.strategy,
    copySize: config.sizing.copySize,
    maxOrderSizeUsd: config.sizing.maxOrderSizeUsd,
    minOrderSizeUsd: config.sizing.minOrderSizeUsd,
  });

  // Initialize clients
  const chain = new ChainClient(config.chain);
  const dataApi = new DataApiClient({
    dataApiUrl: config.polymarket.dataApiUrl,
    requestTimeoutMs: config.network.requestTimeoutMs,
    networkRetryLimit: config.network.networkRetryLimit,
  });
  const submitter = new ClobOrderSubmitter(
    {
      clobHost: config.polymarket.clobHost,
      chainId: config.polymarket.chainId,
      privateKey: config.accounts.privateKey,
      proxyWallet: config.accounts.proxyWallet,
      retryLimit: config.network.retryLimit,
    },
    chain
  );

  // System check; degraded results warn and continue
  const checks = await runSystemCheck({
    chain,
    balances: chain,
    dataApi,
    walletAddress: config.accounts.proxyWallet,
    minBalanceUsdc: config.sizing.minOrderSizeUsd,
  });
  const overall = getOverallHealth(checks);
  if (overall !== 'healthy') {
    log.warn(`System check ${overall}, continuing`);
  }

  await submitter.connect();

  const service = new CopyTradingService(serviceConfigFromAppConfig(config), {
    positions: dataApi,
    balances: chain,
    submitter,
  });

  let server: Server | null = null;
  if (config.api.enabled) {
    const app = createApp(
      {
        copyTrading: service,
        isSubmitterConnected: () => submitter.isConnected(),
      },
      { enableMetrics: config.api.enableMetrics }
    );
    server = await startApiServer(app, config.api.port);
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${reason}, shutting down...`);

    try {
      await service.stop();
      if (server) {
        await stopApiServer(server);
      }
      log.info('Shutdown complete');
      process.exit(exitCode);
    } catch (error) {
      log.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM', 0));
  process.on('SIGINT', () => void shutdown('SIGINT', 0));

  service.on('fatal', (error: Error) => {
    log.error('Copy trading halted, restart required', { error: error.message });
    void shutdown('fatal feed error', 1);
  });

  await service.start();
  log.info('Copy trading bot started successfully');
  log.warn('Live trading is enabled. Real money is at risk!');
}

// Run main
main().catch((error: unknown) => {
  log.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
