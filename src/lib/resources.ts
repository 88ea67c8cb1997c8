import type { RandomSource } from "@/types";
import { VEHICLES } from "@/config/resources";
import { defaultRandom, randomChoice, randomInt } from "@/lib/random";

export type VehicleAssignment = { vehicle: string; officers: readonly string[] };

export function pickVehicle(
    random: RandomSource = defaultRandom,
    roster: Readonly<Record<string, readonly string[]>> = VEHICLES
): VehicleAssignment {
    const vehicle = randomChoice(random, Object.keys(roster));
    return { vehicle, officers: [...roster[vehicle]] };
}

/** One usage count in [1, 3] per selected item. */
export function allocateEquipment(
    selected: readonly string[],
    random: RandomSource = defaultRandom
): Record<string, number> {
    return Object.fromEntries(selected.map((item) => [item, randomInt(random, 1, 3)]));
}
