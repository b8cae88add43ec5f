import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for the root liveness probe
 */
export const ApiLivenessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Liveness check',
      description: 'Answers as long as the process serves HTTP',
    }),
    ApiResponse({
      status: 200,
      description: 'Controller is running',
      schema: {
        type: 'object',
        properties: {
          message: { type: 'string', example: 'Vending controller is running' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status and uptime',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check with dependency status',
      description: 'Checks the order ledger and the relay lines',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          checks: {
            type: 'object',
            properties: {
              ledger: { type: 'boolean', example: true },
              relays: { type: 'boolean', example: true },
            },
          },
          details: {
            type: 'object',
            properties: {
              ledger: { type: 'string', example: 'connected' },
              claimedOrders: { type: 'number', example: 12 },
              channels: { type: 'number', example: 16 },
              slots: { type: 'number', example: 32 },
              pendingTasks: { type: 'number', example: 0 },
            },
          },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for service statistics
 */
export const ApiServiceStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get service statistics',
      description: 'Event counters, dispense totals per slot and runtime info',
    }),
    ApiResponse({
      status: 200,
      description: 'Service statistics',
      schema: {
        type: 'object',
        properties: {
          events: {
            type: 'object',
            nullable: true,
            properties: {
              totalEvents: { type: 'number' },
              eventCounts: { type: 'object', additionalProperties: { type: 'number' } },
              lastEventAt: { type: 'object', additionalProperties: { type: 'string' } },
              dispenses: {
                type: 'object',
                properties: {
                  total: { type: 'number' },
                  degraded: { type: 'number' },
                  bySlot: { type: 'object', additionalProperties: { type: 'number' } },
                  averageDurationMs: { type: 'number' },
                  lastDurationMs: { type: 'number', nullable: true },
                },
              },
            },
          },
          pipeline: {
            type: 'object',
            properties: {
              intakeStages: { type: 'array', items: { type: 'string' } },
              fulfilmentStages: { type: 'array', items: { type: 'string' } },
              fates: { type: 'object', additionalProperties: { type: 'number' } },
            },
          },
          tasks: {
            type: 'object',
            properties: {
              pending: { type: 'number' },
              submitted: { type: 'number' },
              failed: { type: 'number' },
            },
          },
          dwellMs: { type: 'number', example: 3300 },
          runtime: {
            type: 'object',
            properties: {
              uptime: { type: 'number' },
              node: { type: 'string', example: 'v20.11.0' },
            },
          },
        },
      },
    }),
  );
};
