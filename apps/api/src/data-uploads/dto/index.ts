export * from './data-upload-fields.dto';
