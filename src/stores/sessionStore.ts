import { DEFAULT_RETENTION_LIMIT, DEFAULT_SESSION_CONFIG } from "@/lib/constants";
import type { SessionConfig } from "@/lib/domain/schema";
import { createStore, type StoreApi } from "zustand/vanilla";
import { createConfigSlice } from "./slices/createConfigSlice";
import { createHistorySlice } from "./slices/createHistorySlice";
import type { SessionStore } from "./types";

export type SessionStoreApi = StoreApi<SessionStore>;

export const createSessionStore = (options: { config?: SessionConfig; retentionLimit?: number } = {}): SessionStoreApi => {
    const config = options.config ?? DEFAULT_SESSION_CONFIG;
    const retentionLimit = options.retentionLimit ?? DEFAULT_RETENTION_LIMIT;

    return createStore<SessionStore>()((...a) => ({
        ...createConfigSlice(config)(...a),
        ...createHistorySlice(retentionLimit)(...a),
    }));
};
