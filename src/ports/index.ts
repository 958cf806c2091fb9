/**
 * Ports - Hexagonal Architecture Interfaces
 *
 * Boundaries between the event pipeline and the outside world.
 *
 * ┌────────────────────────────────────────────────────────────────┐
 * │ Clock          - time and cancellable timers                   │
 * │ ReaderLink     - serial request/response to the tag reader     │
 * │ CapturePort    - camera stills for a detection                 │
 * │ ClassifierPort - artifact description (vision model)           │
 * │ TransportPort  - upload / notification delivery                │
 * └────────────────────────────────────────────────────────────────┘
 */

export type { Clock, ClockTimer } from './clock.js';
export { SystemClock, createSystemClock, assertValidDelay } from './clock.js';

export type { ReaderLink } from './reader.js';
export type { CapturePort } from './capture.js';
export type { ClassifierPort } from './classifier.js';
export type { TransportPort } from './transport.js';
