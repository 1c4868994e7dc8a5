export class Tile {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly samples: number;
  // summed linear radiance, 3 floats per pixel, row major inside the tile
  data: Float32Array;

  constructor(x: number, y: number, width: number, height: number, samples: number, data?: Float32Array) {
    this.x = x;
    this.y = y;
    this.width = width;
    this.height = height;
    this.samples = samples;
    this.data = data ?? new Float32Array(width * height * 3);
  }
}

export class TileManager {
  // row strips of at most tileHeight rows covering the image exactly once
  static partition(width: number, height: number, tileHeight: number, samples: number): Tile[] {
    let tiles: Tile[] = [];
    for (let y = 0; y < height; y += tileHeight) {
      tiles.push(new Tile(0, y, width, Math.min(tileHeight, height - y), samples));
    }
    return tiles;
  }

  static resetTileData(tile: Tile): void {
    if (tile.data.length !== tile.width * tile.height * 3) {
      tile.data = new Float32Array(tile.width * tile.height * 3);
    }

    tile.data.fill(0);
  }

  static addSample(radianceData: Float32Array, canvasWidth: number, tile: Tile): void {
    for (let j = 0; j < tile.height; j++) {
      for (let i = 0; i < tile.width; i++) {
        let x = tile.x + i;
        let y = tile.y + j;

        let index = (canvasWidth * y + x) * 3;
        let tileIndex = (tile.width * j + i) * 3;

        radianceData[index + 0] += tile.data[tileIndex + 0];
        radianceData[index + 1] += tile.data[tileIndex + 1];
        radianceData[index + 2] += tile.data[tileIndex + 2];
      }
    }
  }
}
