// Test environment
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.LEDGER_CUSTODY_ACCOUNT = 'ledger-custody';

jest.setTimeout(30000);
