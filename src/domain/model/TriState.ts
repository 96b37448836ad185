/**
 * Estado agregado de selección de un directorio
 */
export enum TriState {
  NotSelected = "NotSelected",
  PartiallySelected = "PartiallySelected",
  FullySelected = "FullySelected",
}
