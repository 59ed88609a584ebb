/**
 * Link Store Selection
 * MongoDB when the connection succeeded at startup, memory otherwise
 */

import { connectDB } from '../../lib/mongo';
import { MemoryLinkRepository } from './links.memory-repository';
import { mongoLinkRepository } from './links.repository';
import { LinkStore } from './links.types';

let activeStore: LinkStore = new MemoryLinkRepository();

export const getLinkStore = (): LinkStore => activeStore;

export const setLinkStore = (store: LinkStore): void => {
  activeStore = store;
};

/**
 * Connect to MongoDB and pick the store. Called once at startup.
 */
export const initializeLinkStore = async (useDatabase: boolean = true): Promise<LinkStore> => {
  const connected = useDatabase ? await connectDB() : false;
  activeStore = connected ? mongoLinkRepository : new MemoryLinkRepository();

  if (!connected) {
    console.warn('Link store: using in-memory storage, links are lost on exit');
  }
  console.log(`Link store: ${activeStore.name}`);

  return activeStore;
};
