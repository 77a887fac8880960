import mongoose, { Schema, type Connection, type Model } from 'mongoose';
import type { Note, NoteStore, StoredNote } from './types';

const DATABASE_NAME = 'notes';
const COLLECTION_NAME = 'notes';
const SERVER_SELECTION_TIMEOUT_MS = 5000;

export const noteSchema = new Schema<Note>(
  {
    title: { type: String, required: true },
    description: { type: String, required: true },
    important: { type: Boolean, required: true, default: false },
  },
  {
    collection: COLLECTION_NAME,
    versionKey: false,
  }
);

/**
 * Raw document as read with `lean()`, so no schema defaults have run.
 * Older documents in the collection carry the description under `desc`.
 */
export interface RawNoteDocument {
  _id: unknown;
  title?: unknown;
  description?: unknown;
  desc?: unknown;
  important?: unknown;
}

const UNTITLED = 'No Title';

export function toStoredNote(doc: RawNoteDocument): StoredNote {
  const description = doc.description ?? doc.desc;
  return {
    id: String(doc._id),
    title: typeof doc.title === 'string' ? doc.title : UNTITLED,
    description: typeof description === 'string' ? description : '',
    important: doc.important === true,
  };
}

/**
 * MongoDB-backed note store. Owns its own mongoose connection so the
 * process-wide default connection stays untouched.
 */
export class MongoNoteStore implements NoteStore {
  private constructor(
    private readonly connection: Connection,
    private readonly notes: Model<Note>
  ) {}

  static async connect(uri: string): Promise<MongoNoteStore> {
    const connection = await mongoose
      .createConnection(uri, {
        dbName: DATABASE_NAME,
        serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS,
        bufferCommands: false,
      })
      .asPromise();
    return new MongoNoteStore(connection, connection.model<Note>('Note', noteSchema));
  }

  async list(): Promise<StoredNote[]> {
    // _id is an ObjectId, so ascending _id is insertion order
    const docs = await this.notes.find({}).sort({ _id: 1 }).lean().exec();
    return docs.map(toStoredNote);
  }

  async insert(note: Note): Promise<StoredNote> {
    const doc = await this.notes.create({
      title: note.title,
      description: note.description,
      important: note.important,
    });
    return toStoredNote(doc.toObject());
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
