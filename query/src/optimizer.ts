/**
 * @stratum/query - Optimizer
 *
 * Rewrite pass run on logical plans before lowering. It currently returns
 * its input unchanged; the planner must not depend on any rewrite.
 */

import type { LogicalPlan } from './logical-plan.js';

export class Optimizer {
  optimize(plan: LogicalPlan): LogicalPlan {
    return plan;
  }
}
