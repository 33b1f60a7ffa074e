export enum RestoreLayoutEnum {
  NESTED = "nested", // <restore>/<container>/<attachment>/<filename>
  FLAT = "flat", // <restore>/<attachment>_<filename>
}
