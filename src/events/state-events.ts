export interface StateTransitionedEvent {
  objectTypeName: string;
  objectId: string;
  trigger: string;
  sourceState: string;
  destState: string;
  actorId: string;
  timestamp: Date;
}
