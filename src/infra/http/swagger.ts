import swaggerJsdoc from 'swagger-jsdoc';

const nullableText = { type: 'string', nullable: true };

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Credential Store API',
      version: '1.0.0',
      description: 'Store and search credential records',
    },
    servers: [
      {
        url: 'http://localhost:8000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        Credential: {
          type: 'object',
          required: ['title', 'username', 'password'],
          properties: {
            title: { type: 'string', example: 'GitHub' },
            username: { type: 'string', example: 'alice' },
            password: { type: 'string', example: 'p@ss' },
            url: { ...nullableText, example: 'https://github.com' },
            note: nullableText,
          },
        },
        CredentialOut: {
          type: 'object',
          required: ['id', 'title', 'username', 'password', 'url', 'note', 'created_at', 'updated_at'],
          properties: {
            id: { type: 'string' },
            title: { type: 'string' },
            username: { type: 'string' },
            password: { type: 'string' },
            url: nullableText,
            note: nullableText,
            created_at: { ...nullableText, format: 'date-time' },
            updated_at: { ...nullableText, format: 'date-time' },
          },
        },
        DatabaseDiagnostics: {
          type: 'object',
          properties: {
            backend: { type: 'string' },
            database: { type: 'string' },
            database_url: nullableText,
            database_name: nullableText,
            connection_status: { type: 'string' },
            collections: { type: 'array', items: { type: 'string' } },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['detail'],
          properties: {
            detail: {
              type: 'string',
              description: 'Underlying error message',
              example: 'connection refused',
            },
          },
        },
      },
    },
    tags: [
      { name: 'System', description: 'Greetings and diagnostics' },
      { name: 'Credentials', description: 'Credential storage and search' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
