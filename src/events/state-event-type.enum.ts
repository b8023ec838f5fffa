export enum StateEventType {
  TRANSITIONED = 'state.transitioned',
}
