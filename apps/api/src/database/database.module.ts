import { Global, Module } from '@nestjs/common';
import { MySqlStore } from './mysql-store.service';
import { SchemaIntrospector } from './schema-introspector.service';
import { STORE } from './store.interface';

@Global()
@Module({
  providers: [
    MySqlStore,
    { provide: STORE, useExisting: MySqlStore },
    SchemaIntrospector,
  ],
  exports: [STORE, SchemaIntrospector],
})
export class DatabaseModule {}
