// src/infrastructure/observability/logging/logger.module.ts
import { Global, Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import { randomUUID } from 'crypto';
import { Request } from 'express';
import { IncomingMessage, ServerResponse } from 'http';
import { EnvConfigService } from '../../config/env-config.service';
import { AppLoggerService } from './app-logger.service';

interface SerializedRequest {
  id: string;
  method: string;
  url: string;
  query: Record<string, unknown>;
  params: Record<string, unknown>;
}

interface SerializedResponse {
  statusCode: number;
}

type ExpressRequest = Request & { id?: string };

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

@Global()
@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService): Params => {
        return {
          pinoHttp: {
            level: config.logLevel,

            // Pretty output outside production, JSON lines in production
            transport: config.isProduction
              ? undefined
              : {
                  target: 'pino-pretty',
                  options: {
                    colorize: true,
                    singleLine: false,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                  },
                },

            genReqId: (req: IncomingMessage): string =>
              headerValue(req.headers['x-request-id']) || randomUUID(),

            customProps: (req: IncomingMessage): Record<string, unknown> => {
              const request = req as ExpressRequest;
              return {
                requestId: request.id,
                userAgent: req.headers['user-agent'],
                ip: request.ip,
              };
            },

            redact: {
              paths: [
                'req.headers.authorization',
                'req.headers.cookie',
                'req.body.password',
                'req.body.currentPassword',
                'req.body.newPassword',
                'req.body.token',
              ],
              censor: '[REDACTED]',
            },

            serializers: {
              req: (req: IncomingMessage): SerializedRequest => {
                const request = req as ExpressRequest;
                return {
                  id: request.id || '',
                  method: req.method || '',
                  url: req.url || '',
                  query: request.query || {},
                  params: request.params || {},
                };
              },
              res: (res: ServerResponse): SerializedResponse => ({
                statusCode: res.statusCode,
              }),
            },

            customLogLevel: (
              _req: IncomingMessage,
              res: ServerResponse,
              err: Error | undefined,
            ): 'error' | 'warn' | 'info' => {
              if (res.statusCode >= 500 || err) return 'error';
              if (res.statusCode >= 400) return 'warn';
              return 'info';
            },

            customSuccessMessage: (req: IncomingMessage, res: ServerResponse): string =>
              `${req.method ?? 'UNKNOWN'} ${req.url ?? '/'} completed with ${res.statusCode}`,
            customErrorMessage: (req: IncomingMessage, _res: ServerResponse, err: Error): string =>
              `${req.method ?? 'UNKNOWN'} ${req.url ?? '/'} failed: ${err.message}`,
          },
        };
      },
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
