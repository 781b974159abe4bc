export { MemoryIncompatibilityOracle } from './memory_incompatibility_oracle';
