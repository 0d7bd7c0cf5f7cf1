export * from './create-scheduler-run.dto';
export * from './run-query.dto';
