export enum EmbedColor {
  GOLD = 0xf1c40f,
  GREEN = 0x2ecc71,
  RED = 0xe74c3c,
  BLURPLE = 0x5865f2,
}
