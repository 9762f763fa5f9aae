import type { Server } from 'http';
import { env } from './config/env';
import { scoringConfig } from './config/scoring';
import { createApp } from './app';
import { SessionStore } from './models/session/session.store';
import { createOpenAICompletionClient, LlmResumeAnalyzer } from './utils/resumeAnalyzer';
import { TheirStackJobSource } from './utils/jobSource';
import { logger } from './utils/logger';

let server: Server | null = null;

function startServer() {
  try {
    const app = createApp({
      analyzer: new LlmResumeAnalyzer(createOpenAICompletionClient(env.OPENAI_API_KEY, env.OPENAI_MODEL)),
      jobSource: new TheirStackJobSource({
        apiKey: env.THEIRSTACK_API_KEY,
        baseUrl: env.THEIRSTACK_API_URL,
        timeoutMs: env.JOB_SEARCH_TIMEOUT_MS
      }),
      sessionStore: new SessionStore(env.SESSION_TTL_MINUTES * 60 * 1000),
      scoringConfig
    });

    server = app.listen(env.PORT, () => {
      logger.info(`Server running on port ${env.PORT}`);
      logger.info(`Environment: ${env.NODE_ENV}`);
      logger.info('Scoring config', scoringConfig);
      logger.info('=== Job Match Backend Started ===');
    });
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
}

// Handle graceful shutdown
function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  if (!server) {
    process.exit(0);
  }
  server.close(error => {
    if (error) {
      logger.error('Error during shutdown', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

// Start the server
if (require.main === module) {
  startServer();
}
