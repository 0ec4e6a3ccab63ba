export enum CandidateSource {
  HEURISTIC = 'HEURISTIC',
  LANGUAGE_MODEL = 'LANGUAGE_MODEL',
  RECOVERED = 'RECOVERED', // Pulled in from the unassigned neighborhood
  ESTIMATED = 'ESTIMATED', // Inlet size derived from CFM
}
