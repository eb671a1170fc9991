export type ArchiveFixtureEntry = {
    name: string;
    content?: string;
    type?: "file" | "directory" | "symlink";
    linkName?: string;
};

const CRC_TABLE = crcTableBuild();

/**
 * Builds an uncompressed zip in memory for tests.
 */
export function zipFixtureBuild(entries: ArchiveFixtureEntry[]): Buffer {
    const locals: Buffer[] = [];
    const centrals: Buffer[] = [];
    let offset = 0;

    for (const entry of entries) {
        const name = Buffer.from(entry.name, "utf8");
        const data = Buffer.from(entry.content ?? "", "utf8");
        const crc = crc32(data);

        const local = Buffer.alloc(30);
        local.writeUInt32LE(0x04034b50, 0);
        local.writeUInt16LE(20, 4);
        local.writeUInt16LE(0x800, 6);
        local.writeUInt32LE(crc, 14);
        local.writeUInt32LE(data.length, 18);
        local.writeUInt32LE(data.length, 22);
        local.writeUInt16LE(name.length, 26);
        locals.push(local, name, data);

        const central = Buffer.alloc(46);
        central.writeUInt32LE(0x02014b50, 0);
        central.writeUInt16LE(20, 4);
        central.writeUInt16LE(20, 6);
        central.writeUInt16LE(0x800, 8);
        central.writeUInt32LE(crc, 16);
        central.writeUInt32LE(data.length, 20);
        central.writeUInt32LE(data.length, 24);
        central.writeUInt16LE(name.length, 28);
        central.writeUInt32LE(offset, 42);
        centrals.push(central, name);

        offset += local.length + name.length + data.length;
    }

    const directory = Buffer.concat(centrals);
    const end = Buffer.alloc(22);
    end.writeUInt32LE(0x06054b50, 0);
    end.writeUInt16LE(entries.length, 8);
    end.writeUInt16LE(entries.length, 10);
    end.writeUInt32LE(directory.length, 12);
    end.writeUInt32LE(offset, 16);
    return Buffer.concat([...locals, directory, end]);
}

/**
 * Builds a ustar archive in memory for tests.
 */
export function tarFixtureBuild(entries: ArchiveFixtureEntry[]): Buffer {
    const blocks: Buffer[] = [];
    for (const entry of entries) {
        const type = entry.type ?? "file";
        const data = type === "file" ? Buffer.from(entry.content ?? "", "utf8") : Buffer.alloc(0);
        const header = Buffer.alloc(512);
        header.write(entry.name, 0, 100, "utf8");
        octalWrite(header, type === "directory" ? 0o755 : 0o644, 100, 8);
        octalWrite(header, 0, 108, 8);
        octalWrite(header, 0, 116, 8);
        octalWrite(header, data.length, 124, 12);
        octalWrite(header, 0, 136, 12);
        header.write(type === "directory" ? "5" : type === "symlink" ? "2" : "0", 156, 1, "ascii");
        if (entry.linkName) {
            header.write(entry.linkName, 157, 100, "utf8");
        }
        header.write("ustar\0", 257, 6, "ascii");
        header.write("00", 263, 2, "ascii");
        header.fill(0x20, 148, 156);
        let sum = 0;
        for (const byte of header) {
            sum += byte;
        }
        header.write(`${sum.toString(8).padStart(6, "0")}\0 `, 148, 8, "ascii");

        blocks.push(header, data);
        const padding = (512 - (data.length % 512)) % 512;
        blocks.push(Buffer.alloc(padding));
    }
    blocks.push(Buffer.alloc(1024));
    return Buffer.concat(blocks);
}

function octalWrite(buffer: Buffer, value: number, offset: number, length: number): void {
    buffer.write(`${value.toString(8).padStart(length - 1, "0")}\0`, offset, length, "ascii");
}

function crc32(data: Buffer): number {
    let crc = 0xffffffff;
    for (const byte of data) {
        crc = (CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
    }
    return (crc ^ 0xffffffff) >>> 0;
}

function crcTableBuild(): number[] {
    const table: number[] = [];
    for (let index = 0; index < 256; index += 1) {
        let value = index;
        for (let bit = 0; bit < 8; bit += 1) {
            value = value & 1 ? 0xedb88320 ^ (value >>> 1) : value >>> 1;
        }
        table.push(value >>> 0);
    }
    return table;
}
