import Phaser from "phaser";

/**
 * Boot scene. The board is drawn from primitives, so there is nothing to
 * preload; it hands straight over to "MainScene".
 */
export class Boot extends Phaser.Scene {
  constructor() {
    super({ key: "Boot" });
  }

  create(): void {
    this.scene.start("MainScene");
  }
}
