import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import swaggerJsdoc from 'swagger-jsdoc';

// Route modules carrying @openapi blocks, found beside this file in src/ or dist/
export const ROUTE_SOURCES = join(
  dirname(fileURLToPath(import.meta.url)),
  'routes',
  '*.{ts,js}'
);

export interface SwaggerInfo {
  title: string;
  version: string;
  serverUrl: string;
}

/**
 * OpenAPI document assembled from the @openapi blocks in the route files.
 */
export function createSwaggerSpec(info: SwaggerInfo): object {
  const options: swaggerJsdoc.Options = {
    definition: {
      openapi: '3.0.0',
      info: {
        title: info.title,
        version: info.version,
        description: 'Username/password authentication with stateless bearer tokens',
      },
      servers: [
        {
          url: info.serverUrl,
          description: 'Development server',
        },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
        schemas: {
          User: {
            type: 'object',
            required: ['id', 'email', 'username', 'is_active', 'is_superuser', 'created_at', 'updated_at'],
            properties: {
              id: { type: 'integer', example: 1 },
              email: { type: 'string', format: 'email', example: 'alice@example.com' },
              username: { type: 'string', example: 'alice' },
              full_name: { type: 'string', nullable: true, example: 'Alice Example' },
              is_active: { type: 'boolean' },
              is_superuser: { type: 'boolean' },
              created_at: { type: 'string', format: 'date-time' },
              updated_at: { type: 'string', format: 'date-time' },
            },
          },
          Token: {
            type: 'object',
            required: ['access_token', 'token_type'],
            properties: {
              access_token: { type: 'string' },
              token_type: { type: 'string', example: 'bearer' },
            },
          },
          ErrorResponse: {
            type: 'object',
            required: ['code', 'message'],
            properties: {
              code: {
                type: 'string',
                description: 'Error code identifier',
                example: 'WEAK_PASSWORD',
              },
              message: {
                type: 'string',
                description: 'Human-readable error message',
                example: 'Password must contain at least one digit',
              },
              details: {
                type: 'object',
                description: 'Additional error details (optional)',
                additionalProperties: true,
              },
            },
          },
        },
      },
      tags: [
        { name: 'Auth', description: 'Registration, login and the current user' },
        { name: 'Admin', description: 'Superuser account management' },
        { name: 'Health', description: 'Liveness and store status' },
      ],
    },
    apis: [ROUTE_SOURCES],
  };

  return swaggerJsdoc(options);
}
