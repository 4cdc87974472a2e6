import { describe, it, expect } from "vitest";
import { bindingMissingPropertyRule } from "../../src/rules/markup/bindingMissingProperty.js";
import { missingCodeBehindRule } from "../../src/rules/markup/missingCodeBehind.js";
import { codeBehindInitializeRule } from "../../src/rules/markup/codeBehindInitialize.js";
import { missingIncludeRule } from "../../src/rules/markup/missingInclude.js";
import { knownTyposRule } from "../../src/rules/markup/knownTypos.js";
import { unsupportedPropertyRule } from "../../src/rules/markup/unsupportedProperty.js";
import { classNamespaceRule } from "../../src/rules/markup/classNamespace.js";
import { unreferencedStyleRule } from "../../src/rules/markup/unreferencedStyle.js";
import { check, lines } from "../helpers.js";

const AVALONIA_CSPROJ = lines(
  '<Project Sdk="Microsoft.NET.Sdk">',
  "  <ItemGroup>",
  '    <PackageReference Include="Avalonia" Version="11.0.10" />',
  "  </ItemGroup>",
  "</Project>",
);

function window(dataType: string | undefined, ...body: string[]): string {
  return lines(
    '<Window xmlns="https://github.com/avaloniaui"',
    '        xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml"',
    '        xmlns:vm="using:Demo.ViewModels"',
    dataType ? `        x:Class="Demo.Views.MainWindow"` : `        x:Class="Demo.Views.MainWindow">`,
    ...(dataType ? [`        x:DataType="${dataType}">`] : []),
    ...body,
    "</Window>",
  );
}

const codeBehind = lines(
  "namespace Demo.Views;",
  "",
  "public partial class MainWindow : Window",
  "{",
  "    public MainWindow()",
  "    {",
  "        InitializeComponent();",
  "    }",
  "}",
);

function viewModel(base: string): string {
  return lines(
    "namespace Demo.ViewModels;",
    "",
    `public partial class MainViewModel : ${base}`,
    "{",
    "    [ObservableProperty]",
    '    private string _title = "";',
    "",
    "    [RelayCommand]",
    "    private void Save() { }",
    "}",
  );
}

describe("markup-binding-missing-property", () => {
  it("reports a property the x:DataType does not declare, once", () => {
    const findings = check(bindingMissingPropertyRule, {
      "Views/MainWindow.axaml": window(
        "vm:MainViewModel",
        '  <StackPanel>',
        '    <TextBlock Text="{Binding Title}"/>',
        '    <TextBlock Text="{Binding Subtitle}"/>',
        '    <TextBlock Text="{Binding Subtitle.Length}"/>',
        '    <Button Command="{Binding SaveCommand}"/>',
        "  </StackPanel>",
      ),
      "Views/MainWindow.axaml.cs": codeBehind,
      "ViewModels/MainViewModel.cs": viewModel("ObservableObject"),
    });
    expect(findings).toEqual([
      {
        ruleId: "markup-binding-missing-property",
        category: "missing-reference",
        severity: "error",
        file: "Views/MainWindow.axaml",
        line: 8,
        message:
          "Binding 'Subtitle' in Views/MainWindow.axaml refers to 'Subtitle', which MainViewModel (ViewModels/MainViewModel.cs) does not declare.",
        fixHint: "Add a public 'Subtitle' property to MainViewModel or fix the binding path.",
        related: ["ViewModels/MainViewModel.cs"],
      },
    ]);
  });

  it("counts members inherited from scanned base classes", () => {
    const findings = check(bindingMissingPropertyRule, {
      "Views/MainWindow.axaml": window("vm:MainViewModel", '  <ProgressBar IsVisible="{Binding IsBusy}"/>'),
      "ViewModels/MainViewModel.cs": viewModel("ViewModelBase"),
      "ViewModels/ViewModelBase.cs": lines(
        "namespace Demo.ViewModels;",
        "public class ViewModelBase : ObservableObject",
        "{",
        "    public bool IsBusy { get; set; }",
        "}",
      ),
    });
    expect(findings).toEqual([]);
  });

  it("stays silent when the base class is outside the scanned files", () => {
    const findings = check(bindingMissingPropertyRule, {
      "Views/MainWindow.axaml": window("vm:MainViewModel", '  <ProgressBar IsVisible="{Binding IsBusy}"/>'),
      "ViewModels/MainViewModel.cs": viewModel("VendorViewModel"),
    });
    expect(findings).toEqual([]);
  });

  it("falls back to the code-behind class without x:DataType", () => {
    const findings = check(bindingMissingPropertyRule, {
      "Views/MainWindow.axaml": window(undefined, '  <TextBlock Text="{Binding Greeting}"/>'),
      "Views/MainWindow.axaml.cs": codeBehind,
    });
    expect(findings.map((f) => [f.line, f.message])).toEqual([
      [5, "Binding 'Greeting' in Views/MainWindow.axaml refers to 'Greeting', which MainWindow (Views/MainWindow.axaml.cs) does not declare."],
    ]);
  });

  it("skips bindings inside data templates", () => {
    const findings = check(bindingMissingPropertyRule, {
      "Views/MainWindow.axaml": window(
        "vm:MainViewModel",
        "  <ListBox>",
        "    <ListBox.ItemTemplate>",
        "      <DataTemplate>",
        '        <TextBlock Text="{Binding Caption}"/>',
        "      </DataTemplate>",
        "    </ListBox.ItemTemplate>",
        "  </ListBox>",
      ),
      "ViewModels/MainViewModel.cs": viewModel("ObservableObject"),
    });
    expect(findings).toEqual([]);
  });
});

describe("markup-missing-code-behind", () => {
  it("reports an x:Class no C# file declares", () => {
    const findings = check(missingCodeBehindRule, {
      "Views/Orphan.axaml": '<UserControl xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml" x:Class="Demo.Views.Orphan"/>',
    });
    expect(findings).toEqual([
      {
        ruleId: "markup-missing-code-behind",
        category: "missing-reference",
        severity: "error",
        file: "Views/Orphan.axaml",
        line: 1,
        message: "x:Class 'Demo.Views.Orphan' has no matching C# class in the scanned files.",
        fixHint: "Create Views/Orphan.axaml.cs declaring 'partial class Orphan'.",
      },
    ]);
  });

  it("accepts a declared class", () => {
    expect(check(missingCodeBehindRule, { "Views/MainWindow.axaml": window(undefined), "Views/MainWindow.axaml.cs": codeBehind })).toEqual([]);
  });
});

describe("markup-code-behind-initialize", () => {
  it("reports code-behind that never loads its markup", () => {
    const findings = check(codeBehindInitializeRule, {
      "Views/MainWindow.axaml": window(undefined),
      "Views/MainWindow.axaml.cs": lines("namespace Demo.Views;", "", "public partial class MainWindow : Window", "{", "}"),
    });
    expect(findings.map((f) => [f.file, f.line, f.severity, f.message])).toEqual([
      [
        "Views/MainWindow.axaml.cs",
        3,
        "warning",
        "MainWindow is the code-behind of Views/MainWindow.axaml but never calls InitializeComponent().",
      ],
    ]);
  });

  it("accepts AvaloniaXamlLoader.Load", () => {
    const findings = check(codeBehindInitializeRule, {
      "App.axaml": '<Application xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml" x:Class="Demo.App"/>',
      "App.axaml.cs": lines(
        "namespace Demo;",
        "public partial class App : Application",
        "{",
        "    public override void Initialize() => AvaloniaXamlLoader.Load(this);",
        "}",
      ),
    });
    expect(findings).toEqual([]);
  });
});

describe("markup-missing-include", () => {
  const app = (source: string) =>
    lines(
      '<Application xmlns="https://github.com/avaloniaui">',
      "  <Application.Styles>",
      '    <FluentTheme />',
      `    <StyleInclude Source="${source}"/>`,
      "  </Application.Styles>",
      "</Application>",
    );

  it("reports a rooted source that is not in the tree", () => {
    const findings = check(missingIncludeRule, { "App.axaml": app("/Styles/Missing.axaml") });
    expect(findings.map((f) => [f.line, f.message])).toEqual([
      [4, '<StyleInclude Source="/Styles/Missing.axaml"> references Styles/Missing.axaml, which does not exist.'],
    ]);
  });

  it("resolves avares:// sources against the owning project", () => {
    const files = {
      "Demo/Demo.csproj": AVALONIA_CSPROJ,
      "Demo/App.axaml": app("avares://Demo/Styles/Gone.axaml"),
    };
    expect(check(missingIncludeRule, files).map((f) => f.message)).toEqual([
      '<StyleInclude Source="avares://Demo/Styles/Gone.axaml"> references Demo/Styles/Gone.axaml, which does not exist.',
    ]);
  });

  it("ignores sources in other assemblies and existing files", () => {
    const files = {
      "Demo/Demo.csproj": AVALONIA_CSPROJ,
      "Demo/App.axaml": app("avares://Avalonia.Themes.Fluent/FluentTheme.xaml"),
      "Demo/Views/Styles.axaml": app("../Styles/Buttons.axaml"),
      "Demo/Styles/Buttons.axaml": '<Styles xmlns="https://github.com/avaloniaui"/>',
    };
    expect(check(missingIncludeRule, files)).toEqual([]);
  });
});

describe("markup-known-typos", () => {
  it("reports misspelled attribute names", () => {
    const findings = check(knownTyposRule, { "Views/Grid.axaml": lines("<Grid", '  ColumnDefinin="*,*">', "</Grid>") });
    expect(findings).toEqual([
      {
        ruleId: "markup-known-typos",
        category: "naming-format",
        severity: "error",
        file: "Views/Grid.axaml",
        line: 2,
        message: "Found 'ColumnDefinin' in 'ColumnDefinin' (should be 'ColumnDefinitions').",
        fixHint: "Rename to 'ColumnDefinitions'.",
      },
    ]);
  });
});

describe("markup-unsupported-property", () => {
  const files = { "Views/Panel.axaml": '<StackPanel Padding="4" Spacing="2" RowGap="3"/>' };

  it("reports properties StackPanel does not define", () => {
    expect(check(unsupportedPropertyRule, files).map((f) => f.message)).toEqual([
      "StackPanel doesn't support Padding (wrap it in a Border instead).",
      "RowGap is not an Avalonia property (use Spacing or Margin instead).",
    ]);
  });

  it("only applies to Avalonia", () => {
    expect(check(unsupportedPropertyRule, files, { flavor: "wpf" })).toEqual([]);
  });
});

describe("markup-class-namespace", () => {
  const view = (xClass: string) =>
    `<UserControl xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml" x:Class="${xClass}"/>`;

  it("compares x:Class to the project namespace and folders", () => {
    const findings = check(classNamespaceRule, {
      "Demo/Demo.csproj": AVALONIA_CSPROJ,
      "Demo/Views/Settings/SettingsView.axaml": view("Demo.Views.SettingsView"),
      "Demo/Views/MainView.axaml": view("Demo.Views.MainView"),
    });
    expect(findings.map((f) => [f.file, f.message])).toEqual([
      [
        "Demo/Views/Settings/SettingsView.axaml",
        "x:Class 'Demo.Views.SettingsView' might not match file location (expected 'Demo.Views.Settings.SettingsView').",
      ],
    ]);
  });

  it("prefers the configured root namespace", () => {
    const findings = check(
      classNamespaceRule,
      { "Views/MainView.axaml": view("Demo.Views.MainView") },
      { config: { rootNamespace: "Acme.App" } },
    );
    expect(findings.map((f) => f.message)).toEqual([
      "x:Class 'Demo.Views.MainView' might not match file location (expected 'Acme.App.Views.MainView').",
    ]);
  });

  it("says nothing without a root namespace to compare against", () => {
    expect(check(classNamespaceRule, { "Views/MainView.axaml": view("Anything.MainView") })).toEqual([]);
  });
});

describe("markup-unreferenced-style", () => {
  it("reports style files App.axaml never includes", () => {
    const style = '<Styles xmlns="https://github.com/avaloniaui"/>';
    const findings = check(unreferencedStyleRule, {
      "Demo/Demo.csproj": AVALONIA_CSPROJ,
      "Demo/App.axaml": lines(
        '<Application xmlns="https://github.com/avaloniaui">',
        "  <Application.Styles>",
        '    <StyleInclude Source="/Styles/Buttons.axaml"/>',
        "  </Application.Styles>",
        "</Application>",
      ),
      "Demo/Styles/Buttons.axaml": style,
      "Demo/Styles/Inputs.axaml": style,
    });
    expect(findings.map((f) => [f.file, f.message])).toEqual([
      ["Demo/Styles/Inputs.axaml", "Style file Inputs.axaml is not referenced in Demo/App.axaml."],
    ]);
  });
});
