import cors from 'cors';
import express, { type Express } from 'express';
import { z } from 'zod';
import { ConfigValidationError, type ConfigStore } from '../services/config.js';
import type { MeterCoordinator } from '../services/coordinator.js';
import { MeterConfigUpdateSchema } from '../types/config.js';
import { logError, logInfo } from '../utils/logger/index.js';

const COMPONENT = 'HttpServer';

const ActionRequestSchema = z.object({ action: z.string() });

export function createApp(
  configStore: ConfigStore,
  coordinator: MeterCoordinator
): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/configuration', (_req, res) => {
    res.json(configStore.all());
  });

  app.post('/configuration', async (req, res) => {
    const changes = MeterConfigUpdateSchema.safeParse(req.body);
    if (!changes.success) {
      res.status(400).json({
        message: 'Invalid configuration',
        issues: changes.error.issues,
      });
      return;
    }

    try {
      await configStore.update(changes.data);
      logInfo(COMPONENT, 'Configuration updated successfully');
      res.json({ message: 'Configuration updated successfully' });
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        res.status(400).json({ message: error.message, issues: error.issues });
        return;
      }
      logError(COMPONENT, 'Failed to update configuration', error);
      res.status(500).json({ message: 'Failed to update configuration' });
    }
  });

  app.put(
    '/certificate/:filename',
    express.raw({ type: '*/*', limit: '1mb' }),
    async (req, res) => {
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        res.status(400).json({ message: 'Certificate body is empty' });
        return;
      }
      const filename = await configStore.saveCertFile(
        req.params.filename,
        req.body
      );
      res.json({ filename });
    }
  );

  app.get('/mqtt_status', (_req, res) => {
    res.json({ connected: coordinator.bus.isConnected() });
  });

  app.post('/action', (req, res) => {
    const request = ActionRequestSchema.safeParse(req.body);
    const action = request.success
      ? coordinator.applyAction(request.data.action, 'UI')
      : null;
    if (!action) {
      res.status(400).json({ message: 'Unknown action' });
      return;
    }
    res.json({ action });
  });

  return app;
}
