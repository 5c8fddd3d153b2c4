export * from './logging/web/ConsoleLogger';
export * from './logging/web/ConsoleLoggerFactory';
export * from './logging/node/TsLogFactory';
export * from './logging/ContractLogger';
export * from './logging/LoggerFactory';
export * from './logging/LoggerSettings';
export * from './logging/Benchmark';

export * from './utils/CustomError';

export * from './core/types';
export * from './core/Binary';
export * from './core/Decoder';
export * from './core/ContractError';
export * from './core/WrapperOptions';
export * from './core/deps/Api';
export * from './core/deps/Deps';
export * from './core/deps/MemoryStorage';
export * from './core/deps/Querier';
export * from './core/deps/Storage';
export * from './core/messages/ContractResponse';
export * from './core/messages/CosmosMsg';
export * from './core/messages/Event';
export * from './core/messages/Reply';
export * from './core/messages/SubMsg';

export * from './contracts/EntryPoint';
export * from './contracts/entryPoints';
export * from './contracts/customize';
export * from './contracts/casting';
export * from './contracts/Contract';
export * from './contracts/ContractWrapper';
export * from './contracts/handler/AbstractEntryPoint';
export * from './contracts/handler/ContractFnEntryPoint';
export * from './contracts/handler/PermissionedFnEntryPoint';
export * from './contracts/handler/ReplyFnEntryPoint';
export * from './contracts/handler/QueryFnEntryPoint';
export * from './contracts/handler/NotImplementedEntryPoint';

export * from './testing/MockApi';
export * from './testing/MockQuerier';
export * from './testing/mocks';
