import swaggerJsdoc from 'swagger-jsdoc';
import { API_INFO } from './routes/home.js';

const userProperties = {
  id: { type: 'string', format: 'uuid' },
  name: { type: 'string', example: 'Alice Doe' },
  email: { type: 'string', format: 'email', example: 'alice@example.com' },
  age: { type: 'integer', nullable: true, minimum: 1, maximum: 150 },
  isDeleted: { type: 'boolean' },
  createdAt: { type: 'string', format: 'date-time' },
  updatedAt: { type: 'string', format: 'date-time' },
  deletedAt: { type: 'string', format: 'date-time', nullable: true },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: API_INFO.name,
      version: API_INFO.version,
      description: API_INFO.description,
    },
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
          properties: userProperties,
        },
        UserList: {
          type: 'object',
          properties: {
            data: { type: 'array', items: { $ref: '#/components/schemas/User' } },
            count: { type: 'integer' },
          },
        },
        CreateUserRequest: {
          type: 'object',
          required: ['name', 'email', 'password'],
          properties: {
            name: { type: 'string', minLength: 2, maxLength: 100 },
            email: { type: 'string', format: 'email', maxLength: 120 },
            password: { type: 'string', minLength: 6, maxLength: 128 },
            age: { type: 'integer', nullable: true, minimum: 1, maximum: 150 },
          },
        },
        UpdateUserRequest: {
          type: 'object',
          minProperties: 1,
          properties: {
            name: { type: 'string', minLength: 2, maxLength: 100 },
            email: { type: 'string', format: 'email', maxLength: 120 },
            password: { type: 'string', minLength: 6, maxLength: 128 },
            age: { type: 'integer', nullable: true, minimum: 1, maximum: 150 },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'VALIDATION_ERROR',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Validation failed',
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
      { name: 'Meta', description: 'Service metadata and health' },
      { name: 'Auth', description: 'Registration and login' },
      { name: 'Users', description: 'User management' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export function buildSwaggerSpec(): Record<string, unknown> {
  return { ...swaggerJsdoc(options) };
}
