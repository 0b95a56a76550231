import { historyRow, type FakeRow } from "./fake-driver";

/** `count` history pages of `perPage` distinct sales each */
export function historyPages(count: number, perPage = 2): FakeRow[][] {
  return Array.from({ length: count }, (_, p) =>
    Array.from({ length: perPage }, (_, r) =>
      historyRow({
        name: `Item ${p + 1}-${r + 1}`,
        price: `${(p + 1) * 100 + r + 1}`,
        date: "1/2/2024",
        time: "3:04:05 PM",
      }),
    ),
  );
}

export const TEST_BASE_URL = "https://auction.test/";
