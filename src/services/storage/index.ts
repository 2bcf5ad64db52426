import { RowStore, StorageError } from './rowStore';
import { isPgDescriptor, openPgRowStore } from './pgRowStore';
import { isDynamoDescriptor, openDynamoRowStore } from './dynamoRowStore';

export type RowStoreOpener = (descriptor: string) => Promise<RowStore>;

/** Opens the store flavor the connection descriptor names. */
export const openRowStore: RowStoreOpener = async (descriptor) => {
  if (isPgDescriptor(descriptor)) {
    return openPgRowStore(descriptor);
  }
  if (isDynamoDescriptor(descriptor)) {
    return openDynamoRowStore(descriptor);
  }
  throw new StorageError('unavailable', 'Unsupported storage descriptor');
};

export * from './rowStore';
export { TABLES, TableName } from './schema';
