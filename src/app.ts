import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import Config from '@/config';
import { errorHandler } from '@/middleware/errorHandler';
import analysisRoutes from '@/routes/analysis.routes';
import coefficientRoutes from '@/routes/coefficient.routes';
import distributionRoutes from '@/routes/distribution.routes';

const app = express();

// Middleware
app.use(express.json({ limit: Config.JSON_BODY_LIMIT }));
app.use(helmet());
app.use(cors({ origin: Config.ALLOWED_ORIGINS }));

// Routes
app.use('/api/v1/analysis', analysisRoutes);
app.use('/api/v1/coefficient', coefficientRoutes);
app.use('/api/v1/distribution', distributionRoutes);

// Health check
const health = (req: express.Request, res: express.Response) => {
  res.json({
    status: 'ok',
    service: Config.SERVICE_NAME,
    timestamp: new Date().toISOString(),
  });
};

app.get('/', health);
app.get('/health', health);

// Error Handler
app.use(errorHandler);

export default app;
