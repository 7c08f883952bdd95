import curationData from "./data/curation.json";
import { CuratedLists } from "./types";

export const defaultCuration: CuratedLists = Object.freeze({
  abusivePrefixes: Object.freeze([...curationData.abusivePrefixes]),
  safeWords: Object.freeze([...curationData.safeWords]),
  abusiveEmoji: Object.freeze([...curationData.abusiveEmoji]),
});
