/**
 * Client-side fulfillment core.
 */

export { FulfillmentController } from './services/FulfillmentController';
export type { FulfillmentControllerOptions } from './services/FulfillmentController';
export { FulfillmentClient } from './services/FulfillmentClient';
export type { FetchLike, FulfillmentBackend, FulfillmentClientOptions } from './services/FulfillmentClient';
export { DebounceTrigger } from './services/DebounceTrigger';
export type { DebounceTriggerConfig, DebounceTriggerHooks, TriggerReason } from './services/DebounceTrigger';
export { PollLoop } from './services/PollLoop';
export type { PollLoopHandlers, PollLoopOptions, PollLoopState } from './services/PollLoop';
export { CycleGuard } from './services/CycleGuard';
export type { CycleToken } from './services/CycleGuard';
export { CardRouter, routeCards } from './services/CardRouter';
export type { AppliedCards, ApplyOptions, RoutedCards } from './services/CardRouter';
export { GhostTextEngine } from './services/GhostTextEngine';
export type { GhostTextEngineOptions, GhostTextState } from './services/GhostTextEngine';
export { DismissedCardTracker } from './services/DismissedCardTracker';
export { FulfillmentEmitter } from './services/FulfillmentEmitter';
export type { CardsEvent, CycleEndEvent, CycleStartEvent, CycleStartReason } from './services/FulfillmentEmitter';
export { MemoryEditorSurface } from './surface/MemoryEditorSurface';
export { toCard, toCards } from './utils/cards';
export { deriveSessionId } from './utils/sessionId';
export * from './store';
