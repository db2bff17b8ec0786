import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'User Directory API',
      version: '1.0.0',
      description: 'User records and object storage behind swappable backends',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        User: {
          type: 'object',
          required: ['id', 'email', 'name', 'active', 'createdAt', 'updatedAt'],
          properties: {
            id: { type: 'string', format: 'uuid' },
            email: { type: 'string', example: 'ada@example.com' },
            name: { type: 'string', example: 'Ada Lovelace' },
            active: { type: 'boolean' },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'CONFLICT',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'User with this email already exists',
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
      { name: 'Users', description: 'User records' },
      { name: 'Storage', description: 'Object storage checks' },
      { name: 'Health', description: 'Liveness and readiness' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
