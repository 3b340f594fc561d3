import type { ILogEntry } from "./ILogEntry";

export interface IAppendOnlyStore {
  /** Insert the entry directly below the header, above every earlier entry. */
  insertAtTop(entry: ILogEntry): Promise<void>;
}
