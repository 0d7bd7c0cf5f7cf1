export * from './run-processing.dto';
