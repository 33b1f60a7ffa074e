export enum AttachmentVersionsEnum {
  ALL = "all",
  LATEST = "latest", // historical versions are left out of resolution and restore
}
