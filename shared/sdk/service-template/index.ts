import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import * as winston from 'winston';

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.json(),
    defaultMeta: { service: process.env.SERVICE_NAME || 'unknown-service' },
    transports: [
        new winston.transports.Console()
    ]
});

export type Logger = winston.Logger;

// One line in, one line out with status and duration
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    logger.info(`Incoming request: ${req.method} ${req.originalUrl}`);

    res.on('finish', () => {
        logger.info(`Completed ${req.method} ${req.originalUrl}`, {
            status: res.statusCode,
            duration_ms: Date.now() - startedAt
        });
    });

    next();
};

export const createService = (name: string): Express => {
    const app = express();
    app.set('name', name);

    app.disable('x-powered-by');
    app.use(cors());
    app.use(requestLogger);

    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok', service: name, timestamp: new Date().toISOString() });
    });

    return app;
};

export const startService = (app: Express, port: number) => {
    const server = app.listen(port, () => {
        logger.info(`${app.get('name') || 'Service'} listening on port ${port}`);
    });
    return server;
};
