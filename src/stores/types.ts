import type { Message, SessionConfig } from "@/lib/domain/schema";
import type { StateCreator } from "zustand/vanilla";

export interface ConfigSlice {
    config: SessionConfig;
    setConfig: (config: SessionConfig) => void;
}

export interface HistorySlice {
    messages: Message[];
    retentionLimit: number;
    isGenerating: boolean;
    appendMessage: (message: Message) => void;
    clearMessages: () => void;
    setGenerating: (generating: boolean) => void;
}

export type SessionStore = ConfigSlice & HistorySlice;

export type StoreSlice<T> = StateCreator<SessionStore, [], [], T>;
