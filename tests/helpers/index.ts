export { getTestApp } from './testApp';
export { authenticatedRequest, tokenFor } from './testAuth';
export { RecordingTransfer, captureLedgerError, expectLedgerError } from './testLedger';
