import type { SessionConfig } from "@/lib/domain/schema";
import type { ConfigSlice, StoreSlice } from "../types";

export const createConfigSlice = (initial: SessionConfig): StoreSlice<ConfigSlice> => (set) => ({
    config: initial,
    setConfig: (config) => set({ config }),
});
