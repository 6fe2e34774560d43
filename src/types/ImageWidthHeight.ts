export interface ImageWidthHeight {
  height: number;
  width: number;
}
