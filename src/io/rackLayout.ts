import type { RackLayout } from '../engine/engineTypes';

export interface SlotPosition {
  rack: number;
  slot: number;
}

// Module instances fill slots firstSlot..firstSlot+slotsPerRack-1 of rack 1, then rack 2, and so on.
export function slotForModule(moduleIndex: number, layout: RackLayout): SlotPosition {
  return {
    rack: Math.floor(moduleIndex / layout.slotsPerRack) + 1,
    slot: layout.firstSlot + (moduleIndex % layout.slotsPerRack)
  };
}

export function racksNeeded(moduleCount: number, layout: RackLayout): number {
  return moduleCount === 0 ? 0 : Math.ceil(moduleCount / layout.slotsPerRack);
}
