import documentHandlers from './documents';
import profileHandlers from './profile';
import scheduleHandlers from './schedule';
import type { OperationMap } from './types';

const operationHandlers: OperationMap = {
  ...documentHandlers,
  ...scheduleHandlers,
  ...profileHandlers,
};

export type { OperationArgs, OperationHandler, PlannerDeps } from './types';

export { operationHandlers };

export default operationHandlers;
