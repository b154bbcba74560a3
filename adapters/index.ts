/**
 * Protocol Adapters
 * Export all adapter implementations
 */

export * from './ledger/InMemoryTokenLedger';
