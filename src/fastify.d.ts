import "fastify";
import type { WikiRepository } from "./lib/wikiRepository.js";

declare module "fastify" {
  interface FastifyInstance {
    wiki: WikiRepository;
  }
}
