import type { EventKind } from './enums.js';

export type Event = {
  id: string;
  kind: EventKind;
  text: string;
  tags: string[];
  data?: Record<string, unknown>;
};
