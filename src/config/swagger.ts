/**
 * Swagger/OpenAPI Configuration
 *
 * API documentation using OpenAPI 3.0 specification
 */

import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

const swaggerDefinition = {
  openapi: '3.0.0',
  info: {
    title: 'Fleet Safety Alerts API',
    version: '1.0.0',
    description: `
Ingests fleet telemetry webhooks (speeding and driver-safety events), stores
them, and relays alerts to a chat channel.

## Webhook authentication

Deliveries are signed with HMAC-SHA1 over the raw request body using the
shared webhook secret. The lowercase hex digest is sent in
\`X-KT-Webhook-Signature\`. Unsigned or mis-signed deliveries get 403.

## Reporting API

\`/api/events\` uses HTTP Basic authentication and is rate limited per client.

## Correlation IDs

All responses include a \`X-Correlation-Id\` header for request tracing.
    `,
  },
  tags: [
    { name: 'Webhook', description: 'Provider webhook ingestion' },
    { name: 'Events', description: 'Stored event reporting' },
    { name: 'Health', description: 'Service health' },
  ],
  components: {
    securitySchemes: {
      basicAuth: {
        type: 'http',
        scheme: 'basic',
      },
    },
    schemas: {
      Error: {
        type: 'object',
        properties: {
          success: { type: 'boolean', example: false },
          error: {
            type: 'object',
            properties: {
              code: { type: 'string', example: 'INVALID_SIGNATURE' },
              message: { type: 'string', example: 'Invalid webhook signature' },
              details: { description: 'Optional error details' },
            },
            required: ['code', 'message'],
          },
        },
        required: ['success', 'error'],
      },
      SuccessResponse: {
        type: 'object',
        properties: {
          success: { type: 'boolean', example: true },
          data: { type: 'object', description: 'Response data (varies by endpoint)' },
        },
        required: ['success', 'data'],
      },
      WebhookEvent: {
        type: 'object',
        required: ['action'],
        properties: {
          action: {
            type: 'string',
            enum: ['speeding_event_created', 'safety_event_created'],
          },
          id: { type: 'integer' },
          driver_id: { type: 'integer' },
          vehicle_id: { type: 'integer' },
          max_vehicle_speed: { type: 'number', description: 'kph' },
          max_posted_speed_limit_in_kph: { type: 'number' },
          max_over_speed_in_kph: { type: 'number' },
          type: { type: 'string', example: 'Hard Braking Event' },
          start_location: {
            type: 'object',
            properties: {
              lat: { type: 'number' },
              lon: { type: 'number' },
            },
          },
        },
      },
      IngestionOutcome: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: ['accepted', 'ignored'] },
          eventIds: { type: 'array', items: { type: 'integer', nullable: true } },
          accepted: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                index: { type: 'integer' },
                eventId: { type: 'integer', nullable: true },
                recordId: { type: 'integer' },
                eventType: { type: 'string' },
              },
            },
          },
          rejected: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                index: { type: 'integer' },
                outcome: { type: 'string', enum: ['ignored', 'invalid', 'failed'] },
                reason: { type: 'string' },
              },
            },
          },
          summary: {
            type: 'object',
            properties: {
              total: { type: 'integer' },
              accepted: { type: 'integer' },
              ignored: { type: 'integer' },
              invalid: { type: 'integer' },
              failed: { type: 'integer' },
            },
          },
          reason: { type: 'string' },
        },
      },
      StoredEvent: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          eventType: {
            type: 'string',
            enum: ['speeding', 'hard_brake', 'acceleration', 'cornering', 'safety'],
          },
          providerEventId: { type: 'integer', nullable: true },
          vehicleUnit: { type: 'string' },
          timestamp: { type: 'string', format: 'date-time' },
          lat: { type: 'number', nullable: true },
          lon: { type: 'number', nullable: true },
          speed: { type: 'number', nullable: true },
          limit: { type: 'number', nullable: true },
          mapLink: { type: 'string', nullable: true },
          receivedAt: { type: 'string', format: 'date-time' },
        },
      },
    },
    responses: {
      BadRequestError: {
        description: 'Malformed or invalid request',
        content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
      },
      UnauthorizedError: {
        description: 'Authentication required',
        content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
      },
      ForbiddenError: {
        description: 'Missing or invalid webhook signature',
        content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
      },
      RateLimitError: {
        description: 'Rate limit exceeded',
        headers: {
          'Retry-After': {
            schema: { type: 'integer' },
            description: 'Seconds to wait before retrying',
          },
        },
        content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
      },
    },
    parameters: {
      CorrelationIdHeader: {
        name: 'X-Correlation-Id',
        in: 'header',
        description: 'Optional correlation ID for request tracing. If not provided, one will be generated.',
        required: false,
        schema: { type: 'string' },
      },
    },
  },
};

const options = {
  swaggerDefinition,
  // Resolved beside this file so annotations are found from src/ and dist/
  apis: [path.join(__dirname, '../routes/*.{ts,js}'), path.join(__dirname, '../app.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
