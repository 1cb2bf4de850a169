import type { StateRecord, StateSnapshot } from "../entities/state-record.js";

export interface StateTransaction {
    readonly records: StateSnapshot;
    get(address: string): StateRecord | undefined;
    commit(record: StateRecord): Promise<void>;
    remove(address: string): Promise<void>;
    release(): Promise<void>;
}

export interface StateStore {
    load(): Promise<StateSnapshot>;
    beginTransaction(): Promise<StateTransaction>;
    forceUnlock(): Promise<boolean>;
}
