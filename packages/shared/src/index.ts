/**
 * # Switchback Shared Types
 *
 * Protocol definitions used on both ends of a switchback connection:
 *
 * - **Transports** - `polling` and `websocket`, and which upgrades are allowed
 * - **Errors** - the stable code/message table sent to polling clients
 * - **Packets** - the JSON packet shape and its codec
 *
 * @module @switchback/shared
 */

export * from "./protocol.js";
