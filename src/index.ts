import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import dotenv from 'dotenv';
import { createRoutes } from './routes';
import { getDatabase } from './config/database';
import { runMigrations } from './database/migrations';

// Load environment variables
dotenv.config();

const app = express();
const PORT = process.env.PORT || 3000;

// Middleware
app.use(helmet());
app.use(cors({
  origin: process.env.FRONTEND_URL || 'http://localhost:3000',
  credentials: true
}));
app.use(express.json({ limit: '10mb' }));
app.use(express.urlencoded({ extended: true, limit: '10mb' }));

// Health check endpoint
app.get('/health', (req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'inbox-triage-core',
    version: '1.0.0'
  });
});

// Initialize and mount API routes
async function startServer(): Promise<void> {
  try {
    console.log('🔧 Initializing services...');

    // Initialize database and run migrations
    console.log('📊 Setting up database...');
    const db = await getDatabase();
    await runMigrations(db);

    const apiRoutes = await createRoutes();

    // Mount API routes
    app.use('/api', apiRoutes);

    // 404 handler
    app.use('*', (req, res) => {
      res.status(404).json({
        error: 'Not Found',
        message: `Route ${req.method} ${req.originalUrl} not found`,
        availableRoutes: {
          health: 'GET /health',
          triage: 'POST /api/triage',
          run: 'POST /api/triage/run',
          deferred: 'GET /api/triage/deferred',
          guardrails: 'POST /api/guardrails/check',
          config: 'GET /api/config'
        }
      });
    });

    // Error handler
    app.use((error: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      console.error('❌ Unhandled error:', error);
      res.status(500).json({
        error: 'Internal Server Error',
        message: 'An unexpected error occurred'
      });
    });

    // Start server
    app.listen(PORT, () => {
      console.log(`🚀 Server running on port ${PORT}`);
      console.log('📬 Inbox Triage API');
      console.log(`🏥 Health check: http://localhost:${PORT}/health`);
      console.log(`📚 API endpoints: http://localhost:${PORT}/api`);
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

// Start the server unless loaded by a test
if (require.main === module) {
  void startServer();
}

export { startServer };
export default app;
