import "dotenv/config";
import { loadConfig } from "@policyqa/core";
import { createPipeline } from "@policyqa/pipeline";
import { hasSwitch, readOption } from "./cli.js";

const command = process.argv[2];
const usage = `Usage:
npm run documents -- list
npm run documents -- delete --id <documentId>
npm run documents -- clear --yes
npm run documents -- stats
npm run documents -- audit [--type document_upload|query|user_feedback]
npm run documents -- feedback --q "<question>" --answer "<answer>" --correct yes|no [--comment "..."]`;

const config = loadConfig();
const pipeline = createPipeline(config);

try {
  switch (command) {
    case "list": {
      const { documents, total } = pipeline.catalog.list();
      console.log("[documents] total:", total);
      for (const d of documents) {
        console.log(`${d.documentId}  ${d.filename}  (${d.documentType}, ${d.chunkCount} chunks)`);
      }
      break;
    }

    case "delete": {
      const id = readOption("id");
      if (!id) {
        console.error(usage);
        process.exitCode = 1;
        break;
      }
      console.log("[documents] deleted", pipeline.catalog.delete(id));
      break;
    }

    case "clear": {
      if (!hasSwitch("yes")) {
        console.error("[documents] clear removes every document; pass --yes to confirm");
        process.exitCode = 1;
        break;
      }
      console.log("[documents] cleared", { deletedChunks: pipeline.catalog.clear() });
      break;
    }

    case "audit": {
      const type = readOption("type");
      const entries = (await pipeline.audit.readAll()).filter((e) => !type || e.type === type);
      for (const e of entries) console.log(JSON.stringify(e));
      console.log("[documents] audit entries:", entries.length);
      break;
    }

    case "stats":
      console.log("[documents] stats", pipeline.catalog.stats());
      break;

    case "feedback": {
      const q = readOption("q");
      const answer = readOption("answer");
      const correct = readOption("correct");
      const comment = readOption("comment");
      if (!q || !answer || (correct !== "yes" && correct !== "no")) {
        console.error(usage);
        process.exitCode = 1;
        break;
      }
      await pipeline.answerer.submitFeedback({
        query: q,
        answer,
        isCorrect: correct === "yes",
        ...(comment ? { comment } : {}),
      });
      console.log("[documents] feedback recorded", { auditLog: config.auditLogPath });
      break;
    }

    default:
      console.error(usage);
      process.exitCode = 1;
  }
} finally {
  pipeline.close();
}
