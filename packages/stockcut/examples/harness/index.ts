export { CuttingStockEnvironment } from "./environment";
export type { EnvironmentConfig, StepResult } from "./environment";
