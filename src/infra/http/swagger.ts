import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Monthly Parking Billing API',
      version: '1.0.0',
      description: 'Slot rentals, bill PDFs, reports and staff accounts for a 14-slot parking facility',
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
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'SLOT_OCCUPIED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Slot SLOT-01 is already occupied for January 2025!',
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
      { name: 'Auth', description: 'Login and logout' },
      { name: 'Billing', description: 'Slot booking and bill PDFs' },
      { name: 'Dashboard', description: 'Summary and search' },
      { name: 'Admin', description: 'Bills, staff accounts and reports' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export function buildSwaggerSpec(): object {
  return swaggerJsdoc(options);
}
