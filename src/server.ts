import { Server } from 'http';
import { createApp } from './app';
import { config } from './config';
import { createJwtAuth, jwksKeyResolver } from './middleware/jwtAuth';
import pipelineService from './services/pipelineService';
import rasterizerService from './services/rasterizerService';
import storageService from './services/storageService';

const auth = config.auth.jwksUri
  ? createJwtAuth({
      getSigningKey: jwksKeyResolver(config.auth.jwksUri),
      issuer: config.auth.issuer,
      audience: config.auth.audience
    })
  : undefined;

const app = createApp({
  pipeline: pipelineService,
  store: storageService,
  rasterizer: rasterizerService,
  auth,
  rateLimitWindowMs: config.rateLimitWindowMs,
  rateLimitMaxRequests: config.rateLimitMaxRequests
});

let server: Server | null = null;

// Start server
async function startServer(): Promise<void> {
  try {
    await storageService.initialize();

    if (!auth) {
      console.warn('AUTH_JWKS_URI not set, /convert is unauthenticated');
    }

    server = app.listen(config.port, '0.0.0.0', () => {
      console.log(`Page Render Server running on port ${config.port}`);
      console.log(`Environment: ${process.env.NODE_ENV}`);
      console.log(
        `Workers: ${config.pipeline.conversionWorkers} conversion, ${config.pipeline.uploadWorkers} upload at ${config.pipeline.dpi} DPI`
      );
      console.log(`Health check: http://localhost:${config.port}/health`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

// Graceful shutdown
function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down gracefully...`);
  if (!server) {
    process.exit(0);
  }
  server.close((err) => {
    if (err) {
      console.error('Error during shutdown:', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

void startServer();
