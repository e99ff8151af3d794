export * from './schema-parity';
export * from './mysql-compat';
export * from './debezium-health';
export * from './schema-history';
export * from './replica-upgrade';
export * from './plan-steps';
