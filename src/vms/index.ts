export { AzureVMManager, createVMManager, parsePowerState } from "./manager.js";
export type { VirtualMachine, VirtualMachineDetail, VMPowerState } from "./types.js";
