/**
 * Tests for kind and content classification
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import type { ContentTypeHandle, ContentTypeSource } from "@filemeta/core";
import { createContentTypeDatabase, type ContentTypeDatabase } from "../content-types/index.js";
import {
  classifyAttributes,
  isExecutableType,
  syntheticTypeName,
  type Classification,
} from "./classifier.js";
import { resolveAttributes } from "./resolver.js";
import { createTempDir, removeTempDir, writeFixture, RecordingLogger } from "../testing/fixtures.js";

describe("syntheticTypeName", () => {
  it("names every non-regular kind", () => {
    expect(syntheticTypeName("socket")).toBe("inode/socket");
    expect(syntheticTypeName("symlink")).toBe("inode/symlink");
    expect(syntheticTypeName("block-device")).toBe("inode/blockdevice");
    expect(syntheticTypeName("directory")).toBe("inode/directory");
    expect(syntheticTypeName("char-device")).toBe("inode/chardevice");
    expect(syntheticTypeName("fifo")).toBe("inode/fifo");
    expect(syntheticTypeName("unknown")).toBe("application/octet-stream");
  });
});

describe("classifyAttributes", () => {
  let database: ContentTypeDatabase;
  let tempDir: string;
  const held: Classification[] = [];

  beforeEach(async () => {
    database = createContentTypeDatabase();
    tempDir = await createTempDir("classifier-test");
  });

  afterEach(async () => {
    for (const classification of held.splice(0)) {
      classification.contentType.unref();
    }
    database.shutdown();
    await removeTempDir(tempDir);
  });

  function classify(filePath: string): Classification {
    const classification = classifyAttributes(
      filePath,
      path.basename(filePath),
      resolveAttributes(filePath),
      database
    );
    held.push(classification);
    return classification;
  }

  it("classifies directories", () => {
    const result = classify(tempDir);
    expect(result.kind).toBe("directory");
    expect(result.contentType.name).toBe("inode/directory");
    expect(result.executable).toBe(false);
  });

  it("classifies dangling links as symlinks", async () => {
    const link = path.join(tempDir, "broken");
    await fs.symlink(path.join(tempDir, "missing"), link);

    const result = classify(link);
    expect(result.kind).toBe("symlink");
    expect(result.contentType.name).toBe("inode/symlink");
  });

  it("classifies a followed link by its target", async () => {
    await fs.mkdir(path.join(tempDir, "real"));
    const link = path.join(tempDir, "alias");
    await fs.symlink(path.join(tempDir, "real"), link);

    const result = classify(link);
    expect(result.kind).toBe("directory");
    expect(result.contentType.name).toBe("inode/directory");
  });

  it("marks an executable shell script", async () => {
    const script = await writeFixture(tempDir, "build.sh", "#!/bin/sh\necho ok\n", 0o755);

    const result = classify(script);
    expect(result.kind).toBe("regular");
    expect(result.contentType.name).toBe("application/x-shellscript");
    expect(result.executePermitted).toBe(true);
    expect(result.executable).toBe(true);
  });

  it("matches executable types through their parents", async () => {
    const script = await writeFixture(tempDir, "run.zsh", "#!/bin/zsh\n", 0o755);
    const python = await writeFixture(tempDir, "tool.py", "print('hi')\n", 0o755);

    expect(classify(script).executable).toBe(true);
    expect(classify(python).executable).toBe(true);
  });

  it("never marks a file without execute permission", async () => {
    const script = await writeFixture(tempDir, "build.sh", "#!/bin/sh\n", 0o644);

    const result = classify(script);
    expect(result.contentType.name).toBe("application/x-shellscript");
    expect(result.executePermitted).toBe(false);
    expect(result.executable).toBe(false);
  });

  it("requires a read bit", async () => {
    const script = await writeFixture(tempDir, "build.sh", "#!/bin/sh\n", 0o311);
    expect(classify(script).executable).toBe(false);
  });

  it("does not mark other types even when their mode allows it", async () => {
    const notes = await writeFixture(tempDir, "notes.txt", "plain text\n", 0o755);

    const result = classify(notes);
    expect(result.contentType.name).toBe("text/plain");
    expect(result.executePermitted).toBe(true);
    expect(result.executable).toBe(false);
  });
});

describe("isExecutableType", () => {
  const handle: ContentTypeHandle = {
    name: "application/x-shellscript",
    ref: () => handle,
    unref: () => {},
  };

  it("treats a failed ancestry lookup as no match", () => {
    const logger = new RecordingLogger();
    const source: ContentTypeSource = {
      lookupByName: () => handle,
      lookupForFile: () => handle,
      ancestorsOf: () => {
        throw new Error("database unavailable");
      },
    };

    expect(isExecutableType(handle, source, logger)).toBe(false);
    expect(logger.entries).toEqual([
      {
        level: "debug",
        message: "Cannot list parents of application/x-shellscript: database unavailable",
      },
    ]);
  });
});
