import { AsyncLocalStorage } from 'node:async_hooks';

interface ItemContext {
  index: number;
  url: string;
}

export const itemContext = new AsyncLocalStorage<ItemContext>();

export function runWithItemContext<T>(context: ItemContext, fn: () => T): T {
  return itemContext.run(context, fn);
}

export function getItemIndex(): number | undefined {
  return itemContext.getStore()?.index;
}

export function getItemUrl(): string | undefined {
  return itemContext.getStore()?.url;
}
