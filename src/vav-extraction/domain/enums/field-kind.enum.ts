export enum FieldKind {
  BOX_ID = 'BOX_ID',
  CFM = 'CFM',
  INLET_SIZE = 'INLET_SIZE',
}
