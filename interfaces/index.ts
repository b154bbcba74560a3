/**
 * Protocol Interfaces
 * Contracts for the collaborators the protocol core consumes
 */

export * from './ITokenLedger';
export * from './IResourceHandler';
