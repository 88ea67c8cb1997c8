// Reference data: vehicles with their crews, and the equipment on the rack.

export const VEHICLES: Readonly<Record<string, readonly string[]>> = {
  "🚒 Fire Engine 1": ["Officer A", "Officer B", "Officer C"],
  "🚒 Fire Engine 2": ["Officer D", "Officer E"],
  "🚑 Rescue Van 1": ["Officer F", "Officer G"],
};

export const EQUIPMENT_CATALOG: readonly string[] = [
  "🧯 Fire Extinguisher",
  "💧 Water Hose",
  "🫁 Oxygen Cylinder",
  "✂ Hydraulic Cutter",
  "🧤 Protective Gear",
];
