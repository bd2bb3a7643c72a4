/**
 * Swagger/OpenAPI Configuration
 *
 * API documentation using OpenAPI 3.0 specification. Paths are collected
 * from the @openapi blocks in the route files.
 */

import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

const swaggerDefinition = {
  openapi: '3.0.0',
  info: {
    title: 'Trip Execution API',
    version: '1.0.0',
    description: `
Queues delivery trip executions against the inventory-tracking API and
reports their progress.

## Flow

1. \`POST /api/v1/trips/{tripId}/execute\` queues an execution (202). A second
   request while one is active joins it and returns the same job id.
2. A worker splits, moves and manifests every order of the trip.
3. \`GET /api/v1/trips/{tripId}/execution-status\` is polled for progress.

## Correlation IDs

All requests/responses include a \`X-Correlation-Id\` header for tracing.
    `,
  },
  servers: [
    {
      url: 'http://localhost:3000',
      description: 'Development server',
    },
  ],
  tags: [
    {
      name: 'Trip Execution',
      description: 'Queue and monitor trip executions',
    },
    {
      name: 'Health',
      description: 'Service health',
    },
  ],
  components: {
    schemas: {
      ErrorResponse: {
        type: 'object',
        properties: {
          success: { type: 'boolean', example: false },
          error: {
            type: 'object',
            properties: {
              code: { type: 'string', example: 'NOT_FOUND' },
              message: { type: 'string', example: 'Trip 42 not found' },
              details: {},
            },
          },
        },
      },
      ExecuteTripResponse: {
        type: 'object',
        properties: {
          tripId: { type: 'integer', example: 42 },
          jobId: { type: 'string', format: 'uuid' },
          executionId: { type: 'integer', example: 7 },
          status: { type: 'string', enum: ['queued', 'processing', 'completed', 'failed'] },
          attached: { type: 'boolean' },
          message: { type: 'string', example: 'Trip execution queued' },
        },
      },
      OrderStatus: {
        type: 'object',
        properties: {
          orderId: { type: 'integer' },
          orderRef: { type: 'string' },
          sequenceOrder: { type: 'integer' },
          status: {
            type: 'string',
            enum: ['pending', 'skipped', 'sublotted', 'inventory_moved', 'manifested', 'failed'],
          },
          errorMessage: { type: 'string', nullable: true },
          manifestId: { type: 'string', nullable: true },
        },
      },
      ExecutionStatus: {
        type: 'object',
        properties: {
          tripId: { type: 'integer' },
          status: { type: 'string', enum: ['not_started', 'queued', 'processing', 'completed', 'failed'] },
          tripStatus: { type: 'string', enum: ['not_started', 'processing', 'completed', 'failed'] },
          progressMessage: { type: 'string', nullable: true },
          generalError: { type: 'string', nullable: true },
          progressPercentage: { type: 'integer', minimum: 0, maximum: 100 },
          jobId: { type: 'string', nullable: true },
          startedAt: { type: 'string', format: 'date-time', nullable: true },
          completedAt: { type: 'string', format: 'date-time', nullable: true },
          orders: { type: 'array', items: { $ref: '#/components/schemas/OrderStatus' } },
        },
      },
    },
  },
};

export const swaggerSpec = swaggerJsdoc({
  definition: swaggerDefinition,
  apis: [path.join(__dirname, '../routes/*.ts'), path.join(__dirname, '../routes/*.js')],
});
