import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from './env';

// Compiled output lives in dist/src, sources in src; both sit next to this directory
const routesGlob = path.join(__dirname, '..', 'routes', `*${path.extname(__filename)}`);

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: process.env.SWAGGER_TITLE || 'Workforce Auth API',
      version: process.env.SWAGGER_VERSION || '1.0.0',
      description: process.env.SWAGGER_DESCRIPTION || 'Authentication, session and authorization endpoints',
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: 'Local development server',
      },
    ],
  },
  apis: [routesGlob],
};

export function setupSwagger(): object {
  return swaggerJsdoc(options);
}
