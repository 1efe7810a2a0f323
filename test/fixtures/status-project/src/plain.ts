export enum Plain {
  A,
  B,
}
