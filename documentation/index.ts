import strategyDoc from './strategy.doc.json';
import adminDoc from './admin.doc.json';

export const swaggerDocs = {
  openapi: '3.0.0',
  info: {
    title: 'Yield Strategy API',
    version: '1.0.0',
    description: 'Utilization rate, deposit tiers, time locks and performance fees for a deposit vault. Amounts and rates are decimal strings of integers; rates are in basis points.'
  },
  servers: [
    { url: 'http://localhost:5000', description: 'Local Dev Server' }
  ],
  components: {
    securitySchemes: {
      bearerAuth: {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        description: 'Enter your JWT token in the format **Bearer &lt;token&gt;**'
      }
    }
  },
  tags: [
    ...strategyDoc.tags,
    ...adminDoc.tags,
  ],
  paths: {
    ...strategyDoc.paths,
    ...adminDoc.paths,
  }
};
