import type { AssumptionId } from '../contracts/assumptions.ids';
import type { AssumptionV1 } from '../contracts/CalculationOutputV1';
import { ASSUMPTION_CATALOG } from './assumptions.catalog';

/**
 * Collects the assumptions applied during one calculation.
 *
 * Each id is recorded once, in the order first added. A fresh builder is
 * created per call so nothing leaks between calculations.
 */
export class AssumptionsBuilder {
  private readonly ids: AssumptionId[] = [];

  add(id: AssumptionId): this {
    if (!this.ids.includes(id)) this.ids.push(id);
    return this;
  }

  addIf(condition: boolean, id: AssumptionId): this {
    return condition ? this.add(id) : this;
  }

  build(): AssumptionV1[] {
    return this.ids.map(id => ({ id, ...ASSUMPTION_CATALOG[id] }));
  }
}
