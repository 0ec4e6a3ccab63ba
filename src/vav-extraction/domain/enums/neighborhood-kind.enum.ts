export enum NeighborhoodKind {
  CALLOUT = 'CALLOUT', // Seed token plus its spatial cluster
  SCHEDULE_ROW = 'SCHEDULE_ROW', // One row of an equipment schedule table
  UNASSIGNED = 'UNASSIGNED', // Tokens reachable from no seed
}
