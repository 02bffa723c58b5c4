export { VirtualMachineInventory, tagValue, VM_DETAIL_PATH } from "./service.js";
export type { VirtualMachineInventoryOptions } from "./service.js";
export type { VirtualMachineWithContext, VirtualMachineHostname, VirtualMachineReportEntry } from "./types.js";
