/**
 * 分析CSVからのウィンドウ取得のテスト
 */

import * as path from "path";
import { NotFoundError, ValidationError } from "../../src/errors";
import {
  findArmRow,
  parseAnalyticsCsv,
  readNumber,
  selectLatestHourRows,
} from "../../src/sources/analytics-csv";
import { CsvWindowSource } from "../../src/sources/csv-window-source";

const FIXTURE = path.join(__dirname, "..", "fixtures", "margin-test.csv");

const HOURLY_CSV = [
  "Demand Name,Hour,Cost,Revenue,Margin %,Demand Bid Rate %,Supply Responses,Supply Impressions",
  "LowMar,10,1,2,30,1.1,100,1000",
  "Control,10,1,3,35,1.0,100,900",
  "LowMar,11,3,4,31,1.2,200,2000",
  "LowMar,12,0,0,31,0,0,0",
].join("\n");

describe("parseAnalyticsCsv", () => {
  it("ヘッダー付きで行を読み込む（空行は無視）", () => {
    const rows = parseAnalyticsCsv("Demand Name,Cost\nA,1\n\nB,2\n");

    expect(rows).toEqual([
      { "Demand Name": "A", Cost: "1" },
      { "Demand Name": "B", Cost: "2" },
    ]);
  });

  it("ヘッダーの前後の空白を除く", () => {
    const rows = parseAnalyticsCsv(" Demand Name , Cost \nA,1");

    expect(rows[0]["Demand Name"]).toBe("A");
    expect(rows[0]["Cost"]).toBe("1");
  });

  it("データ行が無ければ ValidationError", () => {
    expect(() => parseAnalyticsCsv("Demand Name,Cost\n")).toThrow("CSV contains no data rows.");
  });
});

describe("readNumber", () => {
  it("欠落カラムは 0", () => {
    expect(readNumber({ Cost: "1.5" }, "Revenue")).toBe(0);
    expect(readNumber({ Cost: "1.5" }, "Cost")).toBe(1.5);
  });

  it("数値にできない値は ValidationError", () => {
    expect(() => readNumber({ Revenue: "abc" }, "Revenue")).toThrow("Invalid numeric value for Revenue");
  });
});

describe("selectLatestHourRows", () => {
  it("インプレッションがある最後の時間帯の行を返す", () => {
    const rows = selectLatestHourRows(parseAnalyticsCsv(HOURLY_CSV));

    expect(rows).toHaveLength(1);
    expect(rows[0]["Hour"]).toBe("11");
  });

  it("同じ時間帯の行はすべて返す", () => {
    const rows = selectLatestHourRows(
      parseAnalyticsCsv("Demand Name,Hour,Supply Impressions\nA,5,10\nB,5,0\nC,4,10")
    );

    expect(rows.map((r) => r["Demand Name"])).toEqual(["A", "B"]);
  });

  it("インプレッションが無ければ NotFoundError", () => {
    const rows = parseAnalyticsCsv("Demand Name,Hour,Supply Impressions\nA,1,0");

    expect(() => selectLatestHourRows(rows)).toThrow(NotFoundError);
  });
});

describe("findArmRow", () => {
  it("Demand Name に大文字小文字を無視して部分一致", () => {
    const rows = parseAnalyticsCsv(HOURLY_CSV);

    expect(findArmRow(rows, "control")?.["Revenue"]).toBe("3");
    expect(findArmRow(rows, "LOWMAR")?.["Hour"]).toBe("10");
  });

  it("一致しなければ undefined", () => {
    expect(findArmRow(parseAnalyticsCsv(HOURLY_CSV), "HighMar")).toBeUndefined();
  });
});

describe("CsvWindowSource", () => {
  it("アームの行をウィンドウに変換", async () => {
    const source = await CsvWindowSource.fromFile(FIXTURE, "LowMar");

    await expect(source.fetchWindow()).resolves.toEqual({
      impressions: 60000,
      revenue: 21,
      cost: 14,
      margin: 30,
      bidRate: 1.8,
      responses: 30000,
    });
    expect(source.name).toBe("csv");
  });

  it("latestHourOnly なら最新時間帯の行を使う", async () => {
    const source = new CsvWindowSource({ csvText: HOURLY_CSV, arm: "LowMar", latestHourOnly: true });

    const window = await source.fetchWindow();

    expect(window.margin).toBe(31);
    expect(window.impressions).toBe(2000);
  });

  it("latestHourOnly でなければ最初に一致した行", async () => {
    const source = new CsvWindowSource({ csvText: HOURLY_CSV, arm: "LowMar" });

    const window = await source.fetchWindow();

    expect(window.margin).toBe(30);
    expect(window.impressions).toBe(1000);
  });

  it("最新時間帯にアームが無ければ NotFoundError", async () => {
    const source = new CsvWindowSource({ csvText: HOURLY_CSV, arm: "Control", latestHourOnly: true });

    await expect(source.fetchWindow()).rejects.toThrow("CSV row for arm not found: Control");
  });

  it("数値が壊れていれば ValidationError", async () => {
    const csvText = "Demand Name,Revenue,Supply Impressions\nLowMar,oops,10";
    const source = new CsvWindowSource({ csvText, arm: "LowMar" });

    await expect(source.fetchWindow()).rejects.toBeInstanceOf(ValidationError);
  });

  it("ファイルが無ければ読み込みエラー", async () => {
    await expect(CsvWindowSource.fromFile(path.join(__dirname, "missing.csv"), "LowMar")).rejects.toMatchObject({
      code: "ENOENT",
    });
  });
});
