/*
 * Descriptor Flag System
 * ----------------------
 * Compact bit flags stored in ServiceDescriptor.flags.
 *
 * Layout:
 *   Bit 0:    Lifetime (0 = singleton, 1 = transient)
 *   Bit 2:    Has cached instance
 *   Bit 3:    Has no dependencies (zero-argument construction)
 *   Others:   Reserved
 */

/** Lifetime flags (bit 0). Extract with `flags & LIFETIME_MASK`. */
export const LIFETIME_SINGLETON = 0b0;
export const LIFETIME_TRANSIENT = 0b1;

export const LIFETIME_MASK = 0b1;

/**
 * State flag: the descriptor's instance slot holds a value.
 * Set once for singletons and value registrations, never for transients.
 */
export const FLAG_HAS_INSTANCE = 1 << 2;

/**
 * State flag: the implementation takes no dependencies.
 * Enables construction without walking a plan.
 */
export const FLAG_HAS_NO_DEPS = 1 << 3;
