import {
  type Archive,
  ArchiveFormat,
  RawPtr,
  type Serializable,
  field,
  list,
  loadGraph,
  rawPtr,
  saveGraph,
  thisRef
} from '../src';

// Define serializable types
class Room implements Serializable {
  constructor(public name: string = '', public depth: number = 0) {}

  exit: Room | null = null;

  serialize(archive: Archive): void {
    archive.visit(thisRef(this), field(this, 'name'), field(this, 'depth'), rawPtr(this, 'exit', Room));
  }
}

class Dungeon implements Serializable {
  rooms: Room[] = [];
  entrance = new RawPtr(Room);

  serialize(archive: Archive): void {
    archive.visit(list(this, 'rooms', () => new Room()), this.entrance);
  }
}

// Build a dungeon whose rooms loop back to the start
const dungeon = new Dungeon();
const hall = new Room('Hall', 0);
const crypt = new Room('Crypt', 1);
const vault = new Room('Vault', 2);
hall.exit = crypt;
crypt.exit = vault;
vault.exit = hall;
dungeon.rooms = [hall, crypt, vault];
dungeon.entrance.set(crypt);

console.log('=== Linked Graph Example ===');

for (const format of [ArchiveFormat.JSON, ArchiveFormat.Binary]) {
  const saved = saveGraph([dungeon], { format });
  console.log(`\n${format}: ${saved.tokenCount} tokens, ${saved.size} bytes`);

  const restored = new Dungeon();
  loadGraph(saved.data, [restored]);

  // Walk the loop from the entrance
  let room = restored.entrance.deref();
  for (let i = 0; i < restored.rooms.length; i++) {
    console.log(`  ${room.name} (depth ${room.depth}) -> ${room.exit?.name ?? 'nowhere'}`);
    if (room.exit === null) {
      break;
    }
    room = room.exit;
  }
  console.log(`  Loop closed: ${restored.rooms[2].exit === restored.rooms[0]}`);
}
