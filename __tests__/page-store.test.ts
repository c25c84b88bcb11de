/**
 * Page store layout tests
 */

import { PageStore } from '../src/page-store';
import { MemoryPageStorage } from '../src/storage/memory-page-storage';
import { intCodec } from '../src/codecs/int-codec';
import { FixedTextCodec } from '../src/codecs/fixed-text-codec';
import { CELLS_PER_PAGE } from '../src/constants';
import { InvalidFileFormatError, IoError } from '../src/errors';
import { FlakyStorage } from './setup';

function emptyPage<T>(value: T): { presence: boolean[]; cells: T[] } {
  return {
    presence: new Array<boolean>(CELLS_PER_PAGE).fill(false),
    cells: new Array<T>(CELLS_PER_PAGE).fill(value)
  };
}

describe('PageStore', () => {
  describe('Layout', () => {
    test('should write the signature and zero-filled slots on create', () => {
      const storage = new MemoryPageStorage();
      const store = PageStore.create(storage, 2, intCodec);

      const bytes = storage.snapshot();
      expect(bytes.length).toBe(2 + 2 * (16 + 512));
      expect(bytes.subarray(0, 2).toString('latin1')).toBe('VM');
      expect(bytes.subarray(2).every(byte => byte === 0)).toBe(true);
      expect(store.fileSize()).toBe(1058);
      expect(storage.getMemoryStats().syncCount).toBe(1);
    });

    test('should compute page offsets from the slot size', () => {
      const ints = PageStore.create(new MemoryPageStorage(), 4, intCodec);
      expect(ints.slotSize).toBe(528);
      expect(ints.pageOffset(0)).toBe(2);
      expect(ints.pageOffset(3)).toBe(2 + 3 * 528);

      const text = PageStore.create(new MemoryPageStorage(), 2, new FixedTextCodec(5));
      expect(text.slotSize).toBe(16 + 1024);
      expect(text.pageOffset(1)).toBe(1042);
      expect(text.fileSize()).toBe(2 + 2 * 1040);
    });

    test('should report the expected file size for a layout', () => {
      expect(PageStore.fileSizeFor(40, 512)).toBe(2 + 40 * 528);
      expect(PageStore.fileSizeFor(0, 512)).toBe(2);
    });
  });

  describe('Page I/O', () => {
    test('should encode the presence bitmap bit by bit', () => {
      const storage = new MemoryPageStorage();
      const store = PageStore.create(storage, 2, intCodec);
      const page = emptyPage(0);
      for (const i of [0, 9, 127]) {
        page.presence[i] = true;
        page.cells[i] = i + 1000;
      }

      store.writePage(1, page.presence, page.cells);

      const bytes = storage.snapshot();
      const bitmapAt = 2 + 528;
      expect(bytes[bitmapAt]).toBe(0x01);
      expect(bytes[bitmapAt + 1]).toBe(0x02);
      expect(bytes[bitmapAt + 15]).toBe(0x80);
      expect(bytes.subarray(bitmapAt + 2, bitmapAt + 15).every(byte => byte === 0)).toBe(true);
      expect(bytes.readInt32LE(bitmapAt + 16 + 9 * 4)).toBe(1009);
      expect(bytes.readInt32LE(bitmapAt + 16 + 127 * 4)).toBe(1127);
      // Page 0 untouched
      expect(bytes.subarray(2, 2 + 528).every(byte => byte === 0)).toBe(true);
    });

    test('should read back what was written', () => {
      const store = PageStore.create(new MemoryPageStorage(), 3, new FixedTextCodec(6));
      const page = emptyPage('');
      page.presence[5] = true;
      page.cells[5] = 'abcdef';
      page.presence[64] = true;
      page.cells[64] = 'xy';

      store.writePage(2, page.presence, page.cells);
      const content = store.readPage(2);

      expect(content.presence.filter(Boolean).length).toBe(2);
      expect(content.presence[5]).toBe(true);
      expect(content.presence[64]).toBe(true);
      expect(content.cells[5]).toBe('abcdef');
      expect(content.cells[64]).toBe('xy');
      expect(content.cells[6]).toBe('');
    });

    test('should sync after every page write', () => {
      const storage = new MemoryPageStorage();
      const store = PageStore.create(storage, 1, intCodec);
      const page = emptyPage(0);
      store.writePage(0, page.presence, page.cells);
      store.writePage(0, page.presence, page.cells);
      expect(storage.getMemoryStats().syncCount).toBe(3);
    });

    test('should reject page numbers outside the layout', () => {
      const store = PageStore.create(new MemoryPageStorage(), 2, intCodec);
      expect(() => store.readPage(2)).toThrow(RangeError);
      expect(() => store.readPage(-1)).toThrow(RangeError);
    });
  });

  describe('Short transfers', () => {
    function flakyStore(): { storage: FlakyStorage; store: PageStore<number> } {
      const base = new MemoryPageStorage();
      PageStore.create(base, 2, intCodec);
      const storage = new FlakyStorage(base.snapshot());
      return { storage, store: PageStore.open(storage, 2, intCodec) };
    }

    test('should fail a short bitmap read', () => {
      const { storage, store } = flakyStore();
      storage.shortReadAt = store.pageOffset(1);

      let caught: unknown = null;
      try {
        store.readPage(1);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(IoError);
      if (caught instanceof IoError) {
        expect(caught.operation).toBe('bitmap read');
        expect(caught.expectedBytes).toBe(16);
        expect(caught.actualBytes).toBe(15);
      }
    });

    test('should fail a short data read', () => {
      const { storage, store } = flakyStore();
      storage.shortReadAt = store.pageOffset(0) + 16;

      expect(() => store.readPage(0)).toThrow(
        'I/O error (data read) on memory: short read (expected 512 bytes, got 511)'
      );
    });

    test('should fail a short write', () => {
      const { storage, store } = flakyStore();
      storage.shortWrites = true;
      const page = emptyPage(0);

      expect(() => store.writePage(0, page.presence, page.cells)).toThrow(
        'I/O error (bitmap write) on memory: short write (expected 16 bytes, got 15)'
      );
    });
  });

  describe('Open validation', () => {
    test('should reject a missing signature', () => {
      const storage = new MemoryPageStorage(Buffer.from('XX' + '\0'.repeat(528), 'latin1'));
      expect(() => PageStore.open(storage, 1, intCodec)).toThrow(InvalidFileFormatError);
      expect(() => PageStore.open(storage, 1, intCodec)).toThrow('missing "VM" signature');
    });

    test('should reject a file shorter than the declared layout', () => {
      const base = new MemoryPageStorage();
      PageStore.create(base, 2, intCodec);
      const storage = new MemoryPageStorage(base.snapshot());

      expect(() => PageStore.open(storage, 3, intCodec)).toThrow(
        'Invalid file format for memory: file is 1058 bytes, layout needs 1586 (3 pages of 528 bytes)'
      );
    });

    test('should reject a page area that does not divide into slots', () => {
      const base = new MemoryPageStorage();
      PageStore.create(base, 2, intCodec);
      const storage = new MemoryPageStorage(base.snapshot());

      expect(() => PageStore.open(storage, 1, new FixedTextCodec(5))).toThrow(InvalidFileFormatError);
    });

    test('should accept a longer file made of whole slots', () => {
      const base = new MemoryPageStorage();
      PageStore.create(base, 3, intCodec);
      const store = PageStore.open(new MemoryPageStorage(base.snapshot()), 2, intCodec);
      expect(store.numPages).toBe(2);
      expect(store.fileSize()).toBe(1586);
    });
  });
});
