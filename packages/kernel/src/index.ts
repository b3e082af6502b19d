/**
 * # Switchback Kernel
 *
 * Infrastructure shared by every switchback package. Currently this is the
 * structured {@link Logger}.
 *
 * @module @switchback/kernel
 */

export * from "./logger.js";
