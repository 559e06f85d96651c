import swaggerJsdoc from 'swagger-jsdoc';

const todoSchema = {
  type: 'object',
  required: ['id', 'title', 'description', 'status', 'due_date', 'created_at', 'updated_at'],
  properties: {
    id: { type: 'integer', example: 1 },
    title: { type: 'string', example: 'Buy groceries' },
    description: { type: 'string', example: 'Milk, eggs, bread' },
    status: { type: 'string', enum: ['Pending', 'Done', 'Cancelled'] },
    due_date: { type: 'string', format: 'date-time', nullable: true },
    created_at: { type: 'string', format: 'date-time' },
    updated_at: { type: 'string', format: 'date-time' },
  },
};

export function buildSwaggerSpec(appName: string): object {
  const options: swaggerJsdoc.Options = {
    definition: {
      openapi: '3.0.0',
      info: {
        title: appName,
        version: '1.0.0',
        description: 'Multi-user todo API with JWT bearer authentication',
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
          ErrorResponse: {
            type: 'object',
            required: ['code', 'message'],
            properties: {
              code: {
                type: 'string',
                description: 'Error code identifier',
                example: 'NOT_FOUND',
              },
              message: {
                type: 'string',
                description: 'Human-readable error message',
                example: 'Todo with id 42 not found',
              },
              details: {
                type: 'object',
                description: 'Additional error details (optional)',
                additionalProperties: true,
              },
            },
          },
          User: {
            type: 'object',
            required: ['id', 'email', 'username', 'is_active', 'created_at'],
            properties: {
              id: { type: 'integer', example: 1 },
              email: { type: 'string', format: 'email' },
              username: { type: 'string' },
              is_active: { type: 'boolean' },
              created_at: { type: 'string', format: 'date-time' },
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
          Todo: todoSchema,
          TodoList: {
            type: 'object',
            required: ['todos', 'total'],
            properties: {
              todos: { type: 'array', items: { $ref: '#/components/schemas/Todo' } },
              total: { type: 'integer', description: 'Filtered count before pagination' },
            },
          },
        },
      },
      tags: [
        { name: 'Auth', description: 'Registration, login and profile' },
        { name: 'Todos', description: 'Todo management for the authenticated user' },
      ],
    },
    apis: ['./src/infra/http/routes/*.ts'],
  };

  return swaggerJsdoc(options);
}
