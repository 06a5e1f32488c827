export type {
  EventIndexDocument,
  EventPartition,
  IndexedEvent as Event,
} from '@promogen/shared/types';
