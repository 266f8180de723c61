// Test setup file

process.env.STAGE = 'test';
process.env.AWS_REGION = 'eu-west-1';
process.env.PRODUCTS_TABLE = 'inventory-products-test';
process.env.LOG_LEVEL = 'ERROR';
process.env.POWERTOOLS_LOG_LEVEL = 'SILENT';

// Placeholder credentials so the SDK never looks further; every client is mocked
process.env.AWS_ACCESS_KEY_ID = 'test-access-key';
process.env.AWS_SECRET_ACCESS_KEY = 'test-secret';
