/**
 * AssumptionSet: the immutable bundle of model toggles threaded through
 * every stage. Each stage reads only the flags it owns:
 *
 *   molecular   acute_1a_clamp, adhd_cohort
 *   circuit     gut_bias + every edge toggle (see circuit-topology.ts)
 *   aggregation adhd_cohort, gut_bias (cohort offsets)
 */

import { ASSUMPTION_KEYS } from "@/types/simulation";
import type { AssumptionToggles } from "@/types/simulation";

export type AssumptionSet = Readonly<AssumptionToggles>;

export function buildAssumptionSet(toggles: Partial<AssumptionToggles> = {}): AssumptionSet {
  const set: AssumptionToggles = {
    acute_1a_clamp: false,
    adhd_cohort: false,
    gut_bias: false,
    trkB_facilitation: false,
    alpha2a_hcn_closure: false,
    mu_opioid_bonding: false,
    a2a_d2_heteromer: false,
    alpha2c_gate: false,
    bla_cholinergic_salience: false,
    oxytocin_prosocial: false,
    vasopressin_gating: false,
  };
  for (const key of ASSUMPTION_KEYS) {
    set[key] = toggles[key] ?? false;
  }
  return Object.freeze(set);
}
