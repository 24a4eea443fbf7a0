import { MessageIdSchema, type Message, type Part, type Role } from "@/lib/domain/schema";
import { randomUUID } from "crypto";

const nowIso = () => new Date().toISOString();
const makeId = () => MessageIdSchema.parse(randomUUID());

type CreateMessageArgs = {
    role: Role;
    parts: Part[];
    incomplete?: boolean;
};

/**
 * Builds a frozen message. Parts are copied and frozen so later edits by the caller
 * cannot reach stored history.
 */
export const createMessage = (args: CreateMessageArgs): Message => {
    return Object.freeze({
        id: makeId(),
        role: args.role,
        parts: args.parts.map((part) => Object.freeze({ ...part })),
        createdAt: nowIso(),
        incomplete: args.incomplete ?? false,
    });
};

/**
 * Counts exchanges. Every user message opens a new exchange; model messages
 * belong to the exchange before them.
 */
export const countExchanges = (messages: readonly Message[]): number => {
    let count = 0;
    for (const message of messages) {
        if (message.role === "user" || count === 0) count++;
    }
    return count;
};

/**
 * Drops the oldest whole exchanges until at most `limit` remain.
 */
export const trimToLimit = (messages: readonly Message[], limit: number): Message[] => {
    let excess = countExchanges(messages) - limit;
    if (excess <= 0) return [...messages];

    let start = 0;
    while (excess > 0 && start < messages.length) {
        start++;
        // Skip over the model turns of the exchange being evicted.
        while (start < messages.length && messages[start].role !== "user") start++;
        excess--;
    }
    return messages.slice(start);
};

/**
 * Pure append:
 * - a user message that would open exchange `limit + 1` evicts the oldest exchange first
 * - model messages never evict, they complete the current exchange
 */
export const appendMessage = (messages: readonly Message[], message: Message, limit: number): Message[] => {
    return trimToLimit([...messages, message], limit);
};
