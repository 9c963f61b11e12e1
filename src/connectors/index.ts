// Execution clients, exchange connectors and data pipelines
export * from './ExecutionClient';
export * from './SimulatedExecutionClient';
export * from './LiveExecutionClient';
export * from './ExchangeConnector';
export * from './InMemoryExchangeConnector';
export * from './DataPipeline';
