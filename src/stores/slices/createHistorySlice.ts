import { appendMessage } from "@/lib/llm/history";
import type { HistorySlice, StoreSlice } from "../types";

export const createHistorySlice = (retentionLimit: number): StoreSlice<HistorySlice> => (set) => ({
    messages: [],
    retentionLimit,
    isGenerating: false,
    appendMessage: (message) => set((state) => ({
        messages: appendMessage(state.messages, message, state.retentionLimit),
    })),
    // Fresh array each time so subscribers always see a change.
    clearMessages: () => set({ messages: [] }),
    setGenerating: (generating) => set({ isGenerating: generating }),
});
