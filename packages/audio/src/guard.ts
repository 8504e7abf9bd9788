import { PoolGuardError } from './errors'

/**
 * Mutual-exclusion guard for the oscillator list.
 *
 * The stepping lane and the render lane both touch the list; every access
 * goes through `run`, which holds the guard for exactly one short critical
 * section. Nested entry throws instead of deadlocking.
 */
export class PoolGuard {
  private held = false

  get isHeld(): boolean {
    return this.held
  }

  run<T>(section: () => T): T {
    if (this.held) {
      throw new PoolGuardError()
    }
    this.held = true
    try {
      return section()
    } finally {
      this.held = false
    }
  }
}
