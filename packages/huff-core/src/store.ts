import Database from 'better-sqlite3';
import type { Container, DocID } from './types.js';
import { decodeContainer, encodeContainer } from './container.js';
import { IOError } from './errors.js';

export interface StoredDoc { doc: DocID; name: string; originalSize: number; packedSize: number; }

export interface ContainerStore{
  putContainer(name:string,container:Container,originalSize:number):DocID;
  getContainer(name:string):Container|null;
  containerAt(doc:DocID):Container|null;
  docName(doc:DocID):string|null;
  list():StoredDoc[]; count():number; close():void; db:Database.Database;

  // Batched operations
  batchContainers(entries: Array<{name:string;container:Container;originalSize:number}>):DocID[];
}

type Row = { doc:number; name:string; original_size:number; packed_size:number };

export interface StoreOptions { readonly?: boolean; }

// readonly: the database must already exist; nothing is created or migrated
export function openStore(path='huff.db',options:StoreOptions={}):ContainerStore{
  let db:Database.Database;
  try { db=options.readonly?new Database(path,{readonly:true,fileMustExist:true}):new Database(path); }
  catch(e){ throw new IOError(options.readonly?'read':'write',path,e); }
  if(!options.readonly){
    if(path!==':memory:') db.pragma('journal_mode = WAL');
    db.exec(`CREATE TABLE IF NOT EXISTS containers(doc INTEGER PRIMARY KEY, name TEXT UNIQUE, data BLOB, original_size INTEGER, packed_size INTEGER);`);
  }

  const put=db.prepare(`INSERT INTO containers(name,data,original_size,packed_size) VALUES(?,?,?,?)
    ON CONFLICT(name) DO UPDATE SET data=excluded.data, original_size=excluded.original_size, packed_size=excluded.packed_size
    RETURNING doc`);

  // Query statements
  const qN=db.prepare('SELECT data FROM containers WHERE name = ?');
  const qD=db.prepare('SELECT data FROM containers WHERE doc = ?');
  const qName=db.prepare('SELECT name FROM containers WHERE doc = ?');
  const qL=db.prepare('SELECT doc,name,original_size,packed_size FROM containers ORDER BY doc ASC');
  const qC=db.prepare('SELECT COUNT(*) as c FROM containers');

  const insert=(name:string,container:Container,originalSize:number):DocID=>{
    const data=Buffer.from(encodeContainer(container));
    const r=put.get(name,data,originalSize,data.length) as {doc:number};
    return r.doc;
  };
  const load=(r:{data:Buffer}|undefined):Container|null=>r?decodeContainer(r.data):null;

  return { db,
    putContainer:insert,
    getContainer(n){return load(qN.get(n) as {data:Buffer}|undefined);},
    containerAt(d){return load(qD.get(d) as {data:Buffer}|undefined);},
    docName(d){const r=qName.get(d) as {name:string}|undefined; return r?.name ?? null;},
    list(){return (qL.all() as Row[]).map(r=>({doc:r.doc,name:r.name,originalSize:r.original_size,packedSize:r.packed_size}));},
    count(){const r=qC.get() as {c:number}; return r.c;},
    close(){db.close();},

    batchContainers: (entries) => {
      const transaction = db.transaction(() => entries.map(e => insert(e.name, e.container, e.originalSize)));
      return transaction();
    }
  };
}
