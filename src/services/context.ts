import type { JsonStore } from '../storage/jsonStore';

export type ServiceContext = {
  store: JsonStore;
  now: () => Date;
};
