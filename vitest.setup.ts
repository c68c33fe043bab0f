// Vitest setup file

// Set test environment
process.env['NODE_ENV'] = 'test';
