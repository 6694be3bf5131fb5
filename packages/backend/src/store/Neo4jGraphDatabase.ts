import neo4j, {
  type Driver,
  type Node,
  type Relationship,
  type Session,
  type SessionConfig
} from "neo4j-driver";
import type {
  GraphDatabase,
  GraphProperties,
  GraphPropertyValue,
  GraphRecord,
  GraphRecordKind
} from "@customer-graph/shared";

export interface Neo4jGraphDatabaseConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

type AccessMode = "READ" | "WRITE";

const RELATIONSHIP_TYPE_PATTERN = /^[A-Z][A-Z0-9_]*$/;

/**
 * Vertices are `:CustomerEntity` nodes keyed by (customerId, id); edges are
 * typed relationships keyed by their `id` property. Every read and write is
 * scoped to one customer. A write carrying an older extraction id than the
 * stored record leaves its properties untouched.
 */
export class Neo4jGraphDatabase implements GraphDatabase {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jGraphDatabaseConfig) {}

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(this.config.uri, neo4j.auth.basic(this.config.user, this.config.password));

    try {
      await this.driver.verifyConnectivity();
      await this.ensureIndexes();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  async upsertVertex(id: string, type: string, properties: GraphProperties): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        MERGE (v:CustomerEntity {customerId: $customerId, id: $id})
        WITH v
        WHERE coalesce(v.extractionId, "") <= $extractionId
        SET v += $properties, v.type = $type
        `,
        {
          id,
          type,
          customerId: properties.customerId,
          extractionId: properties.extractionId,
          properties: this.serializeProperties(properties)
        }
      );
    });
  }

  async upsertEdge(
    id: string,
    from: string,
    to: string,
    type: string,
    properties: GraphProperties
  ): Promise<void> {
    if (!RELATIONSHIP_TYPE_PATTERN.test(type)) {
      throw new Error(`Unsupported relationship type: ${type}`);
    }

    const written = await this.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        MATCH (s:CustomerEntity {customerId: $customerId, id: $from})
        MATCH (t:CustomerEntity {customerId: $customerId, id: $to})
        MERGE (s)-[r:${type} {id: $id}]->(t)
        FOREACH (_ IN CASE WHEN coalesce(r.extractionId, "") <= $extractionId THEN [1] ELSE [] END |
          SET r += $properties
        )
        RETURN count(r) AS written
        `,
        {
          id,
          from,
          to,
          customerId: properties.customerId,
          extractionId: properties.extractionId,
          properties: this.serializeProperties(properties)
        }
      );
      return this.toNumber(result.records[0]?.get("written"));
    });

    if (written === 0) {
      throw new Error(`Cannot upsert edge ${id}: endpoint ${from} or ${to} does not exist`);
    }
  }

  async queryByCustomer(customerId: string, kind: GraphRecordKind): Promise<GraphRecord[]> {
    return this.withSession("READ", async (session) => {
      if (kind === "vertex") {
        const result = await session.run(
          `
          MATCH (v:CustomerEntity {customerId: $customerId})
          RETURN v
          ORDER BY v.id
          `,
          { customerId }
        );
        return result.records.map((record) => this.mapVertex(record.get("v") as Node));
      }

      const result = await session.run(
        `
        MATCH (s:CustomerEntity {customerId: $customerId})-[r]->(t:CustomerEntity {customerId: $customerId})
        RETURN r, type(r) AS relType, s.id AS fromId, t.id AS toId
        ORDER BY r.id
        `,
        { customerId }
      );
      return result.records.map((record) =>
        this.mapEdge(
          record.get("r") as Relationship,
          this.toString(record.get("relType"), "RELATES_TO"),
          this.toString(record.get("fromId"), ""),
          this.toString(record.get("toId"), "")
        )
      );
    });
  }

  private async ensureIndexes(): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `CREATE CONSTRAINT customer_entity_key IF NOT EXISTS FOR (e:CustomerEntity) REQUIRE (e.customerId, e.id) IS UNIQUE`
      );
      await session.run(
        `CREATE INDEX customer_entity_customer_idx IF NOT EXISTS FOR (e:CustomerEntity) ON (e.customerId)`
      );
    });
  }

  private withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new Error("Neo4jGraphDatabase is not connected. Call connect() first.");
    }

    return this.driver;
  }

  private mapVertex(node: Node): GraphRecord {
    const props = this.asRecord(node.properties);
    return {
      kind: "vertex",
      id: this.toString(props.id, node.elementId),
      type: this.toString(props.type, "UNKNOWN"),
      properties: this.toGraphProperties(props)
    };
  }

  private mapEdge(relationship: Relationship, type: string, from: string, to: string): GraphRecord {
    const props = this.asRecord(relationship.properties);
    return {
      kind: "edge",
      id: this.toString(props.id, relationship.elementId),
      type,
      from,
      to,
      properties: this.toGraphProperties(props)
    };
  }

  private serializeProperties(properties: GraphProperties): Record<string, GraphPropertyValue> {
    const serialized: Record<string, GraphPropertyValue> = {};
    for (const [key, value] of Object.entries(properties)) {
      if (key !== "id") {
        serialized[key] = value;
      }
    }
    return serialized;
  }

  private toGraphProperties(props: Record<string, unknown>): GraphProperties {
    const properties: GraphProperties = {
      customerId: this.toString(props.customerId, ""),
      extractionId: this.toString(props.extractionId, "")
    };

    for (const [key, value] of Object.entries(props)) {
      if (key === "customerId" || key === "extractionId") {
        continue;
      }
      const converted = this.toPropertyValue(value);
      if (converted !== undefined) {
        properties[key] = converted;
      }
    }

    return properties;
  }

  private toPropertyValue(value: unknown): GraphPropertyValue | undefined {
    if (value === null || typeof value === "string" || typeof value === "boolean") {
      return value;
    }
    if (typeof value === "number" || neo4j.isInt(value)) {
      return this.toNumber(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => String(item));
    }
    return undefined;
  }

  private asRecord(value: unknown): Record<string, unknown> {
    const record: Record<string, unknown> = {};
    if (value && typeof value === "object" && !Array.isArray(value)) {
      for (const [key, item] of Object.entries(value)) {
        record[key] = item;
      }
    }
    return record;
  }

  private toString(value: unknown, fallback: string): string {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return fallback;
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (neo4j.isInt(value)) {
      return value.toNumber();
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    return fallback;
  }
}
