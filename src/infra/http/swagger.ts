import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Vacation Auth API',
      version: '1.0.0',
      description: 'Registration, login, session tokens and password reset',
    },
    servers: [
      {
        url: 'http://localhost:3000',
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
        UserRecord: {
          type: 'object',
          required: ['id', 'firstName', 'lastName', 'email', 'role', 'createdAt'],
          properties: {
            id: { type: 'integer', example: 1 },
            firstName: { type: 'string', example: 'Ada' },
            lastName: { type: 'string', example: 'Lovelace' },
            email: { type: 'string', format: 'email', example: 'ada@example.com' },
            role: { type: 'string', enum: ['user', 'admin'] },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
        AuthenticatedUser: {
          type: 'object',
          required: ['user', 'token'],
          properties: {
            user: { $ref: '#/components/schemas/UserRecord' },
            token: { type: 'string', description: 'Session token (JWT)' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'INVALID_CREDENTIALS',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid email or password',
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
      { name: 'Auth', description: 'Registration, login and session tokens' },
      { name: 'Password reset', description: 'Two-step password reset' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
