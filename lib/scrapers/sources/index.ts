import { registerScraper } from "../registry";
import { bilietaiScraper } from "./bilietai";
import { twinsbetScraper } from "./twinsbet";
import { kakavaScraper } from "./kakava";
import { siauliuArenaScraper } from "./siauliuarena";
import { kalnapilioArenaScraper } from "./kalnapilioarena";
import { svyturioArenaScraper } from "./svyturioarena";
import { compensaScraper } from "./compensa";
import { zalgirioArenaScraper } from "./zalgirioarena";

export function registerAllScrapers(): void {
  registerScraper(bilietaiScraper);
  registerScraper(twinsbetScraper);
  registerScraper(kakavaScraper);
  registerScraper(siauliuArenaScraper);
  registerScraper(kalnapilioArenaScraper);
  registerScraper(svyturioArenaScraper);
  registerScraper(compensaScraper);
  registerScraper(zalgirioArenaScraper);
}

export {
  bilietaiScraper,
  twinsbetScraper,
  kakavaScraper,
  siauliuArenaScraper,
  kalnapilioArenaScraper,
  svyturioArenaScraper,
  compensaScraper,
  zalgirioArenaScraper,
};
