/**
 * Store exports
 * Central export point for all zustand stores
 */

export { completionStore, createCompletionStore } from './completionStore';
export type { CompletionSlot, CompletionStore } from './completionStore';
export { feedStore, createFeedStore } from './feedStore';
export type { FeedStore } from './feedStore';
export { createEditorStore } from './editorStore';
export type { EditorStore } from './editorStore';
export { fulfillmentStore, createFulfillmentStore } from './fulfillmentStore';
export type { FulfillmentErrorInfo, FulfillmentStore } from './fulfillmentStore';
