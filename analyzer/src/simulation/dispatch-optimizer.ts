import { Logger } from "@nestjs/common";
import {
  Duration,
  Energy,
  Power,
  batteryFloor,
  chargeEfficiency,
  dischargeEfficiency,
  lossMultiplier,
} from "@battery-savings/domain";
import type {
  BatteryConfig,
  BoundaryPolicy,
  LotKind,
  PairingRecord,
  Reading,
  StepPlan,
  WindowPlan,
} from "@battery-savings/domain";

import { BinaryHeap } from "./structures/binary-heap";
import { LevelProfile } from "./structures/level-profile";
import { LotBook } from "./structures/lot-book";

const EPSILON = 1e-9;

const optimizerLogger = new Logger("DispatchOptimizer");

export interface WindowPlanRequest {
  readings: readonly Reading[];
  startLevelWh: number;
  battery: BatteryConfig;
  boundaryPolicy: BoundaryPolicy;
}

interface Demand {
  index: number;
  value: number;
}

interface Candidate {
  kind: LotKind;
  /** -1 for energy already in the battery at window start. */
  index: number;
  cost: number;
}

/** Carry-in first, then later lots, then surplus before grid. */
function outranks(a: Candidate, b: Candidate): boolean {
  if (a.cost !== b.cost) {
    return a.cost < b.cost;
  }
  if (a.index !== b.index) {
    return a.kind === "carry-in" || (b.kind !== "carry-in" && a.index > b.index);
  }
  return a.kind === "surplus" && b.kind === "grid";
}

function emptyStep(): StepPlan {
  return {storeWh: 0, exportWh: 0, dischargeWh: 0, importWh: 0, gridChargeWh: 0};
}

function gridAllowance(battery: BatteryConfig, reading: Reading): number {
  if (battery.maxGridChargePowerW === null) {
    return Number.POSITIVE_INFINITY;
  }
  return Power.fromWatts(battery.maxGridChargePowerW)
    .forDuration(Duration.fromMinutes(reading.durationMinutes))
    .wattHours;
}

/**
 * Perfect-foresight dispatch plan for one window.
 *
 * Deficit steps are served in descending import price. Each one draws from the
 * cheapest lot that can still reach it and costs less than the import it
 * replaces: energy already in the battery (cost basis 0), surplus of an earlier
 * step (cost basis = export price) or, when enabled, grid charge of an earlier
 * step (cost basis = import price) if that also beats the round-trip loss. A lot at step `i` serving step `j` raises the planned level over
 * `[i, j)`, so it is capped by the headroom left over that range. Surplus no
 * demand took is stored by ascending export price while headroom lasts (unless
 * the boundary policy is `window-only`), and the rest is exported.
 */
export function planWindow(request: WindowPlanRequest): WindowPlan {
  const {readings, battery} = request;
  const count = readings.length;
  const capacityWh = battery.capacityWh;
  const floorWh = batteryFloor(battery).wattHours;
  const chargeEff = chargeEfficiency(battery).ratio;
  const dischargeEff = dischargeEfficiency(battery).ratio;
  const multiplier = lossMultiplier(battery);

  const steps = readings.map(() => emptyStep());
  const pairings: PairingRecord[] = [];
  const levels = new LevelProfile(count, request.startLevelWh);
  const surplusLots = new LotBook(count);
  const gridLots = battery.gridChargeEnabled ? new LotBook(count) : null;
  const demands = new BinaryHeap<Demand>((a, b) => (b.value - a.value) || (a.index - b.index));

  readings.forEach((reading, index) => {
    if (reading.netEnergyWh > 0) {
      surplusLots.offer(index, reading.exportPrice, reading.netEnergyWh);
    } else if (reading.netEnergyWh < 0) {
      demands.push({index, value: reading.importPrice});
    }
    if (gridLots) {
      const allowanceWh = gridAllowance(battery, reading);
      if (allowanceWh > 0) {
        gridLots.offer(index, reading.importPrice, allowanceWh);
      }
    }
  });

  const lotsFor = (kind: LotKind): LotBook | null => (kind === "surplus" ? surplusLots : gridLots);

  for (let demand = demands.pop(); demand; demand = demands.pop()) {
    const target = demand.index;
    const reading = readings[target];
    let outstandingWh = -reading.netEnergyWh;
    let searchFrom = 0;

    while (outstandingWh > EPSILON) {
      let best: Candidate | null = null;
      // A lot costing at least what the demand saves is never drawn; the deficit is imported.
      const carryInWh = demand.value > 0 ? levels.min(target, count - 1) - floorWh : 0;
      if (carryInWh > EPSILON) {
        best = {kind: "carry-in", index: -1, cost: 0};
      }
      const surplusIndex = surplusLots.cheapest(searchFrom, target - 1);
      if (surplusIndex !== null && demand.value > surplusLots.costAt(surplusIndex)) {
        const candidate: Candidate = {kind: "surplus", index: surplusIndex, cost: surplusLots.costAt(surplusIndex)};
        if (!best || outranks(candidate, best)) {
          best = candidate;
        }
      }
      const gridIndex = gridLots?.cheapest(searchFrom, target - 1) ?? null;
      if (gridLots && gridIndex !== null) {
        const cost = gridLots.costAt(gridIndex);
        // The cheapest grid lot failing the test means every grid lot in range fails.
        if (demand.value > cost * multiplier) {
          const candidate: Candidate = {kind: "grid", index: gridIndex, cost};
          if (!best || outranks(candidate, best)) {
            best = candidate;
          }
        }
      }
      if (!best) {
        break;
      }

      const drainNeededWh = outstandingWh / dischargeEff;

      if (best.kind === "carry-in") {
        const drainWh = Math.min(drainNeededWh, carryInWh);
        const deliveredWh = drainWh === drainNeededWh ? outstandingWh : drainWh * dischargeEff;
        levels.add(target, count - 1, -drainWh);
        steps[target].dischargeWh += deliveredWh;
        outstandingWh -= deliveredWh;
        pairings.push({
          lotKind: "carry-in",
          lotTimestamp: null,
          demandTimestamp: reading.timestamp,
          storedWh: drainWh,
          deliveredWh,
          lotCostBasis: 0,
          demandValue: demand.value,
        });
        continue;
      }

      const book = lotsFor(best.kind);
      if (!book) {
        break;
      }
      const lotIndex = best.index;
      const blockedAt = levels.lastAtLeast(lotIndex, target - 1, capacityWh - EPSILON);
      if (blockedAt !== -1) {
        // Nothing at or before a full step can reach this demand.
        searchFrom = blockedAt + 1;
        continue;
      }

      const headroomWh = capacityWh - levels.max(lotIndex, target - 1);
      const lotStorableWh = book.remainingAt(lotIndex) * chargeEff;
      const storedWh = Math.min(drainNeededWh, lotStorableWh, headroomWh);
      if (storedWh <= EPSILON) {
        book.exhaust(lotIndex);
        continue;
      }

      const inputWh = storedWh === lotStorableWh ? book.remainingAt(lotIndex) : storedWh / chargeEff;
      book.consume(lotIndex, inputWh);
      const deliveredWh = storedWh === drainNeededWh ? outstandingWh : storedWh * dischargeEff;
      levels.add(lotIndex, target - 1, storedWh);
      if (best.kind === "surplus") {
        steps[lotIndex].storeWh += inputWh;
      } else {
        steps[lotIndex].gridChargeWh += inputWh;
      }
      steps[target].dischargeWh += deliveredWh;
      outstandingWh -= deliveredWh;
      pairings.push({
        lotKind: best.kind,
        lotTimestamp: readings[lotIndex].timestamp,
        demandTimestamp: reading.timestamp,
        storedWh,
        deliveredWh,
        lotCostBasis: best.cost,
        demandValue: demand.value,
      });
    }

    steps[target].importWh = Math.max(0, -reading.netEnergyWh - steps[target].dischargeWh);
  }

  if (request.boundaryPolicy === "carry-surplus") {
    storeUnmatchedSurplus(readings, steps, levels, surplusLots, capacityWh, chargeEff);
  }

  readings.forEach((reading, index) => {
    if (reading.netEnergyWh > 0) {
      steps[index].exportWh = Math.max(0, reading.netEnergyWh - steps[index].storeWh);
    }
  });

  if (count > 0) {
    optimizerLogger.verbose(
      `Planned window starting ${readings[0].timestamp}: ${count} steps, ${pairings.length} pairings, ` +
      `final level ${Energy.fromWattHours(levels.valueAt(count - 1)).kilowattHours.toFixed(3)} kWh`,
    );
  }

  return {steps, pairings, plannedLevelsWh: levels.toArray()};
}

function storeUnmatchedSurplus(
  readings: readonly Reading[],
  steps: StepPlan[],
  levels: LevelProfile,
  lots: LotBook,
  capacityWh: number,
  chargeEff: number,
): void {
  const last = readings.length - 1;
  const leftovers = new BinaryHeap<number>(
    (a, b) => (lots.costAt(a) - lots.costAt(b)) || (a - b),
    readings.flatMap((_, index) => (lots.remainingAt(index) > EPSILON ? [index] : [])),
  );
  for (let index = leftovers.pop(); index !== undefined; index = leftovers.pop()) {
    const headroomWh = capacityWh - levels.max(index, last);
    if (headroomWh <= EPSILON) {
      continue;
    }
    const storableWh = lots.remainingAt(index) * chargeEff;
    const storedWh = Math.min(storableWh, headroomWh);
    const inputWh = storedWh === storableWh ? lots.remainingAt(index) : storedWh / chargeEff;
    lots.consume(index, inputWh);
    levels.add(index, last, storedWh);
    steps[index].storeWh += inputWh;
  }
}
