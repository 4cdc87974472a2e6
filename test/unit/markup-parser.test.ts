import { describe, it, expect } from "vitest";
import { parseBinding, scanMarkup, stripMarkupTypeName } from "../../src/parser/markup.js";
import { lines } from "../helpers.js";

describe("scanMarkup", () => {
  const view = lines(
    '<UserControl xmlns="https://github.com/avaloniaui"',
    '             xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml"',
    '             xmlns:vm="using:Demo.ViewModels"',
    '             x:Class="Demo.Views.ItemView"',
    '             x:DataType="vm:ItemViewModel">',
    "  <StackPanel>",
    '    <TextBlock Text="{Binding Name}"/>',
    '    <ItemsControl ItemsSource="{Binding Items}">',
    "      <ItemsControl.ItemTemplate>",
    "        <DataTemplate>",
    '          <TextBlock Text="{Binding Label}"/>',
    "        </DataTemplate>",
    "      </ItemsControl.ItemTemplate>",
    "    </ItemsControl>",
    "  </StackPanel>",
    "</UserControl>",
  );

  it("reads root metadata", () => {
    const { view: v, problems } = scanMarkup(view);
    expect(problems).toEqual([]);
    expect(v.root).toBe("UserControl");
    expect(v.xClass).toBe("Demo.Views.ItemView");
    expect(v.xDataType).toBe("ItemViewModel");
    expect(v.elements.map((e) => e.name)).toEqual([
      "UserControl",
      "StackPanel",
      "TextBlock",
      "ItemsControl",
      "ItemsControl.ItemTemplate",
      "DataTemplate",
      "TextBlock",
    ]);
  });

  it("resolves bindings against the x:DataType in scope only", () => {
    const { view: v } = scanMarkup(view);
    expect(v.bindings.map((b) => ({ path: b.path, property: b.property, dataType: b.dataType, line: b.line }))).toEqual([
      { path: "Name", property: "Name", dataType: "ItemViewModel", line: 7 },
      { path: "Items", property: "Items", dataType: "ItemViewModel", line: 8 },
      { path: "Label", property: undefined, dataType: undefined, line: 11 },
    ]);
  });

  it("records element regions closed at their end tag", () => {
    const { regions } = scanMarkup(view);
    const stack = regions.find((r) => r.kind === "element" && r.name === "StackPanel");
    expect(stack).toEqual({ kind: "element", name: "StackPanel", startLine: 6, endLine: 15 });
  });

  it("collects style includes", () => {
    const { view: v } = scanMarkup(
      lines(
        '<Application xmlns="https://github.com/avaloniaui">',
        "  <Application.Styles>",
        '    <StyleInclude Source="/Styles/Buttons.axaml"/>',
        "  </Application.Styles>",
        "</Application>",
      ),
    );
    expect(v.includes).toEqual([{ element: "StyleInclude", source: "/Styles/Buttons.axaml", line: 3 }]);
  });

  it("reports an element left open without giving up", () => {
    const { view: v, problems } = scanMarkup(lines("<Window>", "  <StackPanel>", "</Window>"));
    expect(problems).toEqual([{ message: "<StackPanel> opened at line 2 is not closed before </Window>.", line: 3 }]);
    expect(v.elements).toHaveLength(2);
  });

  it("reports an unterminated attribute value", () => {
    const { view: v, problems } = scanMarkup(lines('<Window Title="oops>', "</Window>"));
    expect(problems).toEqual([{ message: "Attribute 'Title' on <Window> has an unterminated value.", line: 1 }]);
    expect(v.root).toBe("Window");
  });

  it("reports a closing tag with no opener", () => {
    const { problems } = scanMarkup(lines("<Grid/>", "</Border>"));
    expect(problems).toEqual([{ message: "Closing tag </Border> has no matching open tag.", line: 2 }]);
  });

  it("reports an element never closed", () => {
    const { problems } = scanMarkup(lines("<Grid>", "  <Border/>"));
    expect(problems).toEqual([{ message: "<Grid> opened at line 1 is never closed.", line: 1 }]);
  });

  it("reports empty files", () => {
    expect(scanMarkup("  \n").problems).toEqual([{ message: "File is empty.", line: 1 }]);
  });

  it("decodes entities in attribute values and captures element text", () => {
    const { view: v } = scanMarkup(lines("<Project>", "  <PropertyGroup>", "    <Title>A &amp; B</Title>", "  </PropertyGroup>", "</Project>"));
    expect(v.elements.find((e) => e.name === "Title")?.text).toBe("A & B");
  });
});

describe("parseBinding", () => {
  it("takes the first path segment as the property", () => {
    expect(parseBinding("{Binding Path=User.Name}")).toEqual({ path: "User.Name", property: "User" });
    expect(parseBinding("{Binding Items[0].Name}")).toEqual({ path: "Items[0].Name", property: "Items" });
    expect(parseBinding("{CompiledBinding !IsBusy}")).toEqual({ path: "!IsBusy", property: "IsBusy" });
  });

  it("leaves bindings to other sources unresolved", () => {
    expect(parseBinding("{Binding Text, ElementName=box}")).toEqual({ path: "Text" });
    expect(parseBinding("{Binding #Other.Text}")).toEqual({ path: "#Other.Text" });
    expect(parseBinding("{Binding $parent[Window].Title}")).toEqual({ path: "$parent[Window].Title" });
    expect(parseBinding("{Binding}")).toEqual({ path: "" });
  });

  it("ignores other markup extensions", () => {
    expect(parseBinding("{StaticResource Accent}")).toBeUndefined();
    expect(parseBinding("Plain text")).toBeUndefined();
  });
});

describe("stripMarkupTypeName", () => {
  it("drops the xmlns prefix and x:Type wrapper", () => {
    expect(stripMarkupTypeName("vm:MainViewModel")).toBe("MainViewModel");
    expect(stripMarkupTypeName("{x:Type vm:MainViewModel}")).toBe("MainViewModel");
    expect(stripMarkupTypeName("MainViewModel")).toBe("MainViewModel");
  });
});
